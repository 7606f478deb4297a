export const ReportsErrors = {
  INVALID_PERIOD: {
    code: 'REPORT_INVALID_PERIOD',
    message: 'The period is malformed or its start is after its end.',
  },
  COMPUTATION_ERROR: {
    code: 'REPORT_COMPUTATION_ERROR',
    message: 'A metric could not be computed from the stored movements.',
  },
  DATA_UNAVAILABLE: {
    code: 'REPORT_DATA_UNAVAILABLE',
    message: 'Report data is temporarily unavailable. Please retry shortly.',
  },
  UNKNOWN_WIDGET: {
    code: 'REPORT_UNKNOWN_WIDGET',
    message: 'Unknown dashboard widget.',
  },
  DUPLICATE_WIDGET: {
    code: 'REPORT_DUPLICATE_WIDGET',
    message: 'A widget may appear only once in the layout.',
  },
};
