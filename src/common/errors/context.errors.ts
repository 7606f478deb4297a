export const ContextErrors = {
  USER_NOT_FOUND: {
    code: 'CONTEXT_USER_NOT_FOUND',
    message: 'No authenticated user in the request context.',
  },
};
