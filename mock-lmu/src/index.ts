import { createMockLmuServer } from './server';

const PORT = parseInt(process.env.MOCK_LMU_PORT || '6397', 10);

const { server, store, logger } = createMockLmuServer();

// A driver is on track by default so the recorder has something to validate
store.update({ inControlOfVehicle: true });
store.setStandings([
  {
    driverName: 'Test Driver',
    carClass: 'GT3',
    bestLapTime: 0,
    bestLapSectorTime1: 0,
    bestLapSectorTime2: 0,
  },
]);

process.on('SIGTERM', () => {
  logger.info('SIGTERM received, shutting down gracefully');
  server.close(() => {
    logger.info('Server closed');
    process.exit(0);
  });
});

process.on('SIGINT', () => {
  logger.info('SIGINT received, shutting down gracefully');
  server.close(() => {
    logger.info('Server closed');
    process.exit(0);
  });
});

server.listen(PORT, '127.0.0.1', () => {
  logger.info(`Mock LMU server listening`, {
    url: `http://localhost:${PORT}`,
    health: `http://localhost:${PORT}/health`,
  });
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled rejection', reason);
});
