export const AuthErrors = {
  INVALID_TOKEN: {
    code: 'AUTH_INVALID_TOKEN',
    message: 'The access token is invalid or expired.',
  },
  TENANT_INACTIVE: {
    code: 'AUTH_TENANT_INACTIVE',
    message: 'This organisation account is not active.',
  },
  USER_INACTIVE: {
    code: 'AUTH_USER_INACTIVE',
    message: 'This user account is not active.',
  },
};
