type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFields = Record<string, unknown>;

const LEVEL_ORDER: Record<LogLevel | 'silent', number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

function isLevelName(value: string): value is keyof typeof LEVEL_ORDER {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

// Read per call so tests and the CLI can change LOG_LEVEL after import.
function resolveThreshold(): number {
  const raw = (process.env.LOG_LEVEL ?? 'info').trim().toLowerCase();
  return isLevelName(raw) ? LEVEL_ORDER[raw] : LEVEL_ORDER.info;
}

function emit(level: LogLevel, event: string, fields?: LogFields): void {
  if (LEVEL_ORDER[level] < resolveThreshold()) {
    return;
  }

  const line = JSON.stringify({
    time: new Date().toISOString(),
    level,
    event,
    ...fields
  });

  if (level === 'error') {
    console.error(line);
  } else if (level === 'warn') {
    console.warn(line);
  } else {
    console.log(line);
  }
}

export function logDebug(event: string, fields?: LogFields): void {
  emit('debug', event, fields);
}

export function logInfo(event: string, fields?: LogFields): void {
  emit('info', event, fields);
}

export function logWarn(event: string, fields?: LogFields): void {
  emit('warn', event, fields);
}

export function logError(event: string, fields?: LogFields): void {
  emit('error', event, fields);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
