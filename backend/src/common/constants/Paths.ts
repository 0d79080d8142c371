export default {
  Base: '/api',
  Uploads: {
    Base: '/uploads',
    Create: '/',
    Get: '/:uploadId',
    Mapping: '/:uploadId/mapping',
    Process: '/:uploadId/process',
    Cancel: '/:uploadId/cancel',
    Results: '/:uploadId/results',
    Delete: '/:uploadId',
  },
} as const;
