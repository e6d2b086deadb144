export class ProvisionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ProvisionError';
  }
}

/** The credential file exists but cannot be read or holds no usable `password = ` line */
export class CredentialRecoveryError extends ProvisionError {
  constructor(
    readonly path: string,
    options?: { cause?: unknown },
  ) {
    const message =
      options?.cause === undefined
        ? `No password found in existing credential file ${path}`
        : `Unable to read credential file ${path}: ${
            options.cause instanceof Error ? options.cause.message : String(options.cause)
          }`;
    super(message, options);
    this.name = 'CredentialRecoveryError';
  }
}

export class MissingTargetDirectoryError extends ProvisionError {
  constructor(readonly path: string) {
    super(
      `Unable to find the expected data folder ${path}. Please verify that this folder exists.`,
    );
    this.name = 'MissingTargetDirectoryError';
  }
}

/** The archival copy failed; the source directory has not been touched */
export class RelocationCopyError extends ProvisionError {
  constructor(
    readonly source: string,
    readonly destination: string,
    cause: unknown,
  ) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to copy ${source} to ${destination}: ${detail}`, { cause });
    this.name = 'RelocationCopyError';
  }
}

export class ConfigError extends ProvisionError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

export class RunLockedError extends ProvisionError {
  constructor(
    readonly lockPath: string,
    readonly pid: number,
  ) {
    super(`Another provisioning run (pid ${pid}) holds ${lockPath}`);
    this.name = 'RunLockedError';
  }
}

export class CommandError extends ProvisionError {
  constructor(
    readonly command: string,
    readonly args: string[],
    readonly exitCode: number | undefined,
    readonly stderr: string,
  ) {
    const suffix = stderr ? `: ${stderr.trim()}` : '';
    super(`${[command, ...args].join(' ')} failed (exit ${exitCode ?? 'unknown'})${suffix}`);
    this.name = 'CommandError';
  }
}
