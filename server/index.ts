import { createApp } from './app';
import { config } from './config';
import { log, logError } from './logger';

const { server } = createApp();

server.on('error', (err: NodeJS.ErrnoException) => {
  if (err.code === 'EADDRINUSE') {
    logError(`Порт ${config.port} занят, завершите процесс вручную или задайте PORT`, err, 'server');
  } else {
    logError('Server startup error', err, 'server');
  }
  process.exit(1);
});

server.listen(config.port, () => {
  log(`🚀 Sales analytics API: http://localhost:${config.port}/api`, 'server');
  log(`🌍 Environment: ${config.env}`, 'server');
  log(`serving on port ${config.port}`);
});

process.on('unhandledRejection', (reason: unknown) => {
  logError('Unhandled Rejection', reason, 'server');
});

function shutdown(signal: string) {
  log(`${signal}: останавливаю сервер`, 'server');
  server.close(() => process.exit(0));
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
