import fs from 'node:fs';
import path from 'node:path';
import { format } from 'date-fns';
import { config } from './config';

let logsDirReady = false;

function ensureLogsDir(): void {
  if (logsDirReady) return;
  if (!fs.existsSync(config.logDir)) {
    fs.mkdirSync(config.logDir, { recursive: true });
  }
  logsDirReady = true;
}

// Имя файла лога по текущей дате
function getLogFileName(): string {
  return path.join(config.logDir, `server-${format(new Date(), 'yyyy-MM-dd')}.log`);
}

async function writeToLogFile(message: string): Promise<void> {
  try {
    ensureLogsDir();
    await fs.promises.appendFile(getLogFileName(), `${message}\n`, 'utf-8');
  } catch (error) {
    // Не прерываем выполнение при ошибке записи в файл
    console.error('Failed to write to log file:', error);
  }
}

export function log(message: string, source = 'express'): void {
  const formattedTime = new Date().toLocaleTimeString('en-US', {
    hour: 'numeric',
    minute: '2-digit',
    second: '2-digit',
    hour12: true,
  });

  const logMessage = `${formattedTime} [${source}] ${message}`;
  console.log(logMessage);

  if (config.logToFile) {
    void writeToLogFile(logMessage);
  }
}

export function logError(message: string, error: unknown, source = 'express'): void {
  const details = error instanceof Error ? (error.stack ?? error.message) : String(error);
  console.error(`❌ [${source}] ${message}:`, error);

  if (config.logToFile) {
    void writeToLogFile(`[${source}] ERROR ${message}: ${details}`);
  }
}
