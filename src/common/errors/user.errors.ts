export const UserErrors = {
  USER_NOT_FOUND: {
    code: 'USER_NOT_FOUND',
    message: 'User not found.',
  },
  EMAIL_ALREADY_IN_USE: {
    code: 'EMAIL_ALREADY_IN_USE',
    message: 'This e-mail address is already in use.',
  },
  TENANT_REQUIRED: {
    code: 'USER_TENANT_REQUIRED',
    message: 'Every role except super admin must belong to a tenant.',
  },
  SUPER_ADMIN_WITH_TENANT: {
    code: 'USER_SUPER_ADMIN_WITH_TENANT',
    message: 'A super admin cannot belong to a tenant.',
  },
  CANNOT_CHANGE_OWN_STATUS: {
    code: 'USER_CANNOT_CHANGE_OWN_STATUS',
    message: 'You cannot change the status of your own account.',
  },
};
