export class ConfigError extends Error {
  constructor(readonly missing: string[], message?: string) {
    super(message ?? `Missing required environment variables: ${missing.join(", ")}`);
    this.name = "ConfigError";
  }
}

/** Non-success answer from a third-party service (SERP proxy, reader, origin site). */
export class UpstreamError extends Error {
  constructor(
    readonly service: string,
    readonly status: number | undefined,
    message?: string
  ) {
    super(message ?? `${service} returned status ${status ?? "none"}`);
    this.name = "UpstreamError";
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
