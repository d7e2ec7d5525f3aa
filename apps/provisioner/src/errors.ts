/**
 * Provisioning errors.
 *
 * Every failure aborts the run: nothing here is retried or rolled back. The
 * `code` is what the CLI prints and what callers branch on.
 */

export class ProvisioningError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "ProvisioningError";
    this.code = code;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  toJSON() {
    return {
      error: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

export class ConfigError extends ProvisioningError {
  constructor(message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, "CONFIG_ERROR", details, options);
    this.name = "ConfigError";
  }
}

export interface AdminRequestDetails {
  method: string;
  path: string;
  status?: number;
  detail?: string;
}

export class AdminRequestError extends ProvisioningError {
  public readonly status?: number;

  constructor(message: string, request: AdminRequestDetails, options?: { cause?: unknown }) {
    super(message, "ADMIN_REQUEST_FAILED", { ...request }, options);
    this.name = "AdminRequestError";
    this.status = request.status;
  }
}

export class AdminServerUnavailableError extends ProvisioningError {
  constructor(url: string, waitedMs: number, details: Record<string, unknown> = {}) {
    super(`Admin server at ${url} not RUNNING after ${waitedMs}ms`, "ADMIN_SERVER_UNAVAILABLE", {
      url,
      waitedMs,
      ...details,
    });
    this.name = "AdminServerUnavailableError";
  }
}

export class WlstExecutionError extends ProvisioningError {
  public readonly exitCode: number | null;

  constructor(message: string, exitCode: number | null, stderr: string[], options?: { cause?: unknown }) {
    super(message, "WLST_FAILED", { exitCode, stderr }, options);
    this.name = "WlstExecutionError";
    this.exitCode = exitCode;
  }
}

export class DomainExistsError extends ProvisioningError {
  constructor(domainHome: string) {
    super(`Domain already exists at ${domainHome}`, "DOMAIN_EXISTS", { domainHome });
    this.name = "DomainExistsError";
  }
}
