// Console logger for the demo CLI - redacts sensitive info
export const log = {
  info: (msg: string, meta?: Record<string, unknown>) => {
    const safeMeta = meta ? redactSensitive(meta) : undefined;
    console.log(`[INFO] ${msg}`, safeMeta ? JSON.stringify(safeMeta) : "");
  },
  warn: (msg: string, meta?: Record<string, unknown>) => {
    const safeMeta = meta ? redactSensitive(meta) : undefined;
    console.warn(`[WARN] ${msg}`, safeMeta ? JSON.stringify(safeMeta) : "");
  },
  error: (msg: string, meta?: Record<string, unknown>) => {
    const safeMeta = meta ? redactSensitive(meta) : undefined;
    console.error(`[ERROR] ${msg}`, safeMeta ? JSON.stringify(safeMeta) : "");
  },
};

const SENSITIVE_KEYS = ["authorization", "token", "key", "secret", "password", "credential"];

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function redactSensitive(obj: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    const lowerKey = key.toLowerCase();
    if (SENSITIVE_KEYS.some((fragment) => lowerKey.includes(fragment))) {
      result[key] = "[REDACTED]";
    } else if (isPlainObject(value)) {
      result[key] = redactSensitive(value);
    } else {
      result[key] = value;
    }
  }
  return result;
}
