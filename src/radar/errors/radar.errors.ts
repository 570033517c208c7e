export type ErrorContext = Record<string, string | number | null | undefined>;

export class RadarError extends Error {
  readonly context: ErrorContext;

  constructor(message: string, context: ErrorContext = {}, cause?: unknown) {
    super(RadarError.withContext(message, context), { cause });
    this.name = new.target.name;
    this.context = context;
  }

  private static withContext(message: string, context: ErrorContext): string {
    const parts = Object.entries(context)
      .filter(([, value]) => value != null && value !== '')
      .map(([key, value]) => `${key}=${String(value)}`);
    return parts.length > 0 ? `${message} (${parts.join(' ')})` : message;
  }
}

export class MalformedItemError extends RadarError {
  constructor(
    readonly reason: string,
    context: { index: number; eventUid?: string | null },
  ) {
    super(`malformed item: ${reason}`, context);
  }
}

export class ConfigurationError extends RadarError {}

export class IncompleteBuildError extends RadarError {
  constructor(message: string, buildId: string, targetId?: string) {
    super(message, { buildId, targetId });
  }
}

export class SnapshotLabelConflictError extends RadarError {
  constructor(label: string, buildId: string) {
    super(`snapshot label already committed: ${label}`, { label, buildId });
  }
}

export class SnapshotStoreError extends RadarError {
  constructor(message: string, buildId: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`${message}: ${detail}`, { buildId }, cause);
  }
}
