export class ConfigurationError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ConfigurationError";
  }
}

export class ManifestError extends ConfigurationError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ManifestError";
  }
}

export class ManifestUnavailableError extends ConfigurationError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ManifestUnavailableError";
  }
}

export class RunRootResetError extends ConfigurationError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "RunRootResetError";
  }
}

export class FetchError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "FetchError";
  }
}

export class InstallError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "InstallError";
  }
}

/** Raised by the import probe; always converted into a warned outcome. */
export class ImportWarning extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ImportWarning";
  }
}

export class RunCancelledError extends Error {
  constructor(message = "Run cancelled.", options?: ErrorOptions) {
    super(message, options);
    this.name = "RunCancelledError";
  }
}

const CONFIGURATION_ERROR_NAMES = new Set([
  "ConfigurationError",
  "ManifestError",
  "ManifestUnavailableError",
  "RunRootResetError"
]);

export function isConfigurationError(error: unknown): error is ConfigurationError {
  if (error instanceof ConfigurationError) {
    return true;
  }

  return hasErrorName(error) && CONFIGURATION_ERROR_NAMES.has(error.name);
}

export function isRunCancelledError(error: unknown): error is RunCancelledError {
  if (error instanceof RunCancelledError) {
    return true;
  }

  return hasErrorName(error) && error.name === "RunCancelledError";
}

export function toErrorMessage(error: unknown, fallback = "unknown error"): string {
  if (error instanceof Error && error.message.trim() !== "") {
    return error.message;
  }
  return fallback;
}

function hasErrorName(error: unknown): error is { name: string } {
  return typeof error === "object" && error !== null && "name" in error && typeof error.name === "string";
}
