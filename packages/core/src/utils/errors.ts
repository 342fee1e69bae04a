// packages/core/src/utils/errors.ts

/** Invalid engine configuration (.trialflow.yml or programmatic overrides). */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Malformed flow structure: unmatched loop brackets, bad repetition counts,
 * unknown routines or component kinds. Always fatal.
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly entry?: string,
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class UnresolvedNameError extends Error {
  constructor(
    public readonly variable: string,
    public readonly expression?: string,
  ) {
    super(
      expression === undefined
        ? `Unresolved name "${variable}"`
        : `Unresolved name "${variable}" in expression: ${expression}`,
    );
    this.name = 'UnresolvedNameError';
  }
}

export class EvaluationError extends Error {
  constructor(
    message: string,
    public readonly expression: string,
    public readonly position?: number,
    public readonly component?: string,
  ) {
    super(message);
    this.name = 'EvaluationError';
  }

  /** Copy of this error attributed to a component. */
  withComponent(component: string): EvaluationError {
    return new EvaluationError(
      `${this.message} (component "${component}")`,
      this.expression,
      this.position,
      component,
    );
  }
}
