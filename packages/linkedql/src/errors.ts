export type LinkedQlErrorCode =
  | "MALFORMED_INPUT"
  | "MISSING_DISCRIMINATOR"
  | "UNSUPPORTED_TYPE"
  | "UNPARSABLE_VALUE"
  | "INVALID_FIELD_SHAPE"
  | "DUPLICATE_REGISTRATION"
  | "INVALID_REGISTRANT"
  | "REGISTRY_SEALED"
  | "REGISTRY_CONFIGURATION";

export class LinkedQlError extends Error {
  readonly code: LinkedQlErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: LinkedQlErrorCode, message: string, details?: Record<string, unknown>, options?: ErrorOptions) {
    super(message, options);
    this.code = code;
    this.details = details;
    this.name = this.constructor.name;
  }
}

/** Raised per decode call. Never leaves a partially built item behind. */
export class LinkedQlDecodeError extends LinkedQlError {}

/** Raised while the registry is being populated; startup should stop on it. */
export class LinkedQlConfigurationError extends LinkedQlError {}

export class MalformedInputError extends LinkedQlDecodeError {
  constructor(message: string, details?: Record<string, unknown>, options?: ErrorOptions) {
    super("MALFORMED_INPUT", message, details, options);
  }
}

export class MissingDiscriminatorError extends LinkedQlDecodeError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("MISSING_DISCRIMINATOR", message, details);
  }
}

export class UnsupportedTypeError extends LinkedQlDecodeError {
  readonly typeName: string;

  constructor(typeName: string, details?: Record<string, unknown>) {
    super("UNSUPPORTED_TYPE", `unsupported item: "${typeName}"`, { typeName, ...details });
    this.typeName = typeName;
  }
}

export class UnparsableValueError extends LinkedQlDecodeError {
  constructor(message: string, details?: Record<string, unknown>, options?: ErrorOptions) {
    super("UNPARSABLE_VALUE", message, details, options);
  }
}

export class InvalidFieldShapeError extends LinkedQlDecodeError {
  constructor(message: string, details?: Record<string, unknown>, options?: ErrorOptions) {
    super("INVALID_FIELD_SHAPE", message, details, options);
  }
}

export class DuplicateRegistrationError extends LinkedQlConfigurationError {
  constructor(typeName: string) {
    super("DUPLICATE_REGISTRATION", `Type '${typeName}' was already registered`, { typeName });
  }
}

export class InvalidRegistrantError extends LinkedQlConfigurationError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("INVALID_REGISTRANT", message, details);
  }
}

export class RegistrySealedError extends LinkedQlConfigurationError {
  constructor(typeName: string) {
    super("REGISTRY_SEALED", `Cannot register '${typeName}': the registry is sealed`, { typeName });
  }
}

export class RegistryConfigurationError extends LinkedQlConfigurationError {
  readonly issues: readonly LinkedQlConfigurationError[];

  constructor(issues: readonly LinkedQlConfigurationError[]) {
    const summary = issues.map((issue) => `  - ${issue.message}`).join("\n");
    super("REGISTRY_CONFIGURATION", `Registry configuration failed:\n${summary}`, {
      codes: issues.map((issue) => issue.code),
    });
    this.issues = issues;
  }
}
