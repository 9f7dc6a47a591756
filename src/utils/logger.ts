import pino from 'pino';

let correlationId: string | undefined;

export function setCorrelationId(id: string): void {
  correlationId = id;
}

export function generateCorrelationId(): string {
  return `${Date.now()}-${Math.random().toString(36).substring(2, 9)}`;
}

// Command output owns stdout, so every log line goes to stderr.
export function createLogger(context?: Record<string, unknown>): pino.Logger {
  const level = process.env.LOG_LEVEL || 'warn';

  const baseLogger =
    process.env.NODE_ENV === 'development'
      ? pino({
          level,
          transport: {
            target: 'pino-pretty',
            options: {
              destination: 2,
              colorize: true,
              translateTime: 'HH:MM:ss Z',
              ignore: 'pid,hostname',
            },
          },
        })
      : pino({ level }, pino.destination(2));

  const correlationIdValue = correlationId || generateCorrelationId();
  if (!correlationId) {
    setCorrelationId(correlationIdValue);
  }

  return baseLogger.child({
    correlationId: correlationIdValue,
    ...context,
  });
}
