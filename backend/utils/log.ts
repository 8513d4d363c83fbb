export type LogLevel = 'info' | 'warn' | 'error' | 'debug';

type LogListener = (message: string, source: string, level: LogLevel) => void;

// Forwarders for live logs (socket clients outside production)
let logListener: LogListener | null = null;

export function setLogListener(listener: LogListener | null) {
  logListener = listener;
}

function debugEnabled() {
  return (process.env.LOG_LEVEL || '').toLowerCase() === 'debug';
}

export function log(message: string, source = "express", level: LogLevel = 'info') {
  if (level === 'debug' && !debugEnabled()) {
    return;
  }

  const formattedTime = new Date().toLocaleTimeString("en-US", {
    hour: "numeric",
    minute: "2-digit",
    second: "2-digit",
    hour12: true,
  });

  const logMessage = `${formattedTime} [${source}] ${message}`;

  if (level === 'error') {
    console.error(logMessage);
  } else if (level === 'warn') {
    console.warn(logMessage);
  } else {
    console.log(logMessage);
  }

  if (logListener && process.env.NODE_ENV !== 'production') {
    logListener(message, source, level);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
