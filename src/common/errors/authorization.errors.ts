export const AuthorizationErrors = {
  // Shared by role denials and tenant mismatches so the response never says which one it was.
  ACCESS_DENIED: {
    code: 'ACCESS_DENIED',
    message: 'You do not have access to this resource.',
  },
};
