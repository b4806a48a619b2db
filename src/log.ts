export type LogExtra = Record<string, unknown>;

function format(prefix: string, msg: string, extra?: LogExtra): string {
  const ts = new Date().toISOString();
  const tail = extra ? ` ${JSON.stringify(extra)}` : "";
  return `[${ts}] ${prefix} ${msg}${tail}`;
}

export function logLine(prefix: string, msg: string, extra?: LogExtra): void {
  console.log(format(prefix, msg, extra));
}

export function logError(prefix: string, msg: string, extra?: LogExtra): void {
  console.error(format(prefix, msg, extra));
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

/** Shows only the ends of a secret, e.g. `abcd…wxyz`. */
export function maskSecret(secret: string): string {
  if (!secret) return "(unset)";
  if (secret.length <= 8) return "****";
  return `${secret.slice(0, 4)}…${secret.slice(-4)}`;
}
