export type RegistryErrorKind = 'validation' | 'delivery' | 'store';

export class RegistryError extends Error {
  readonly kind: RegistryErrorKind;

  constructor(kind: RegistryErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.kind = kind;
  }
}

export class ValidationError extends RegistryError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super('validation', message);
    this.issues = issues;
  }
}

export class DeliveryError extends RegistryError {
  readonly url: string;
  readonly status?: number;

  constructor(url: string, message: string, options?: { status?: number; cause?: unknown }) {
    super('delivery', message, { cause: options?.cause });
    this.url = url;
    this.status = options?.status;
  }
}

export class StoreInternalError extends RegistryError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('store', message, options);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
