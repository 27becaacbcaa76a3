import type { ProviderName } from "./types.js";

/** The remote endpoint could not produce a usable response. Never retried. */
export class RemoteUnavailableError extends Error {
  readonly provider: ProviderName;
  readonly status?: number;
  readonly code?: string;

  constructor(options: {
    provider: ProviderName;
    message: string;
    status?: number;
    code?: string;
    cause?: unknown;
  }) {
    super(options.message, { cause: options.cause });
    this.name = "RemoteUnavailableError";
    this.provider = options.provider;
    this.status = options.status;
    this.code = options.code;
  }
}

/** Setup is unusable: unknown model, missing provider, or a model without tool support. */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}
