export const TenantErrors = {
  TENANT_NOT_FOUND: {
    code: 'TENANT_NOT_FOUND',
    message: 'Tenant not found.',
  },
  TENANT_SLUG_IN_USE: {
    code: 'TENANT_SLUG_IN_USE',
    message: 'A tenant with this slug already exists.',
  },
  TENANT_INVALID_SLUG: {
    code: 'TENANT_INVALID_SLUG',
    message: 'Slug may only contain lowercase letters, numbers and hyphens.',
  },
};
