/**
 * Base error class for all wikismith errors
 */
export class WikismithError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = "WikismithError";
    // Maintains proper stack trace for where error was thrown (V8 only)
    Error.captureStackTrace?.(this, this.constructor);
  }

  /**
   * Serialize error for logging or JSON output
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    };
  }
}

/**
 * Error for schema validation failures
 */
export class ValidationError extends WikismithError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "VALIDATION_ERROR", context);
    this.name = "ValidationError";
  }
}

/**
 * Error for wikitext the grammar parser rejects.
 * Carries the offending text so a failed roundtrip can be diagnosed.
 */
export class ParseError extends WikismithError {
  constructor(
    message: string,
    public readonly text: string,
    context?: Record<string, unknown>
  ) {
    super(message, "PARSE_ERROR", { ...context, text });
    this.name = "ParseError";
  }
}

/**
 * Error for configuration issues
 */
export class ConfigError extends WikismithError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "CONFIG_ERROR", context);
    this.name = "ConfigError";
  }
}

/**
 * Error while generating a page or writing site output
 */
export class GenerationError extends WikismithError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "GENERATION_ERROR", context);
    this.name = "GenerationError";
  }
}

/**
 * Error for a template name with no entry in the template store
 */
export class TemplateNotFoundError extends WikismithError {
  constructor(
    public readonly templateName: string,
    public readonly key: string
  ) {
    super(`Template not found: ${templateName} -> ${key}`, "TEMPLATE_NOT_FOUND", {
      templateName,
      key,
    });
    this.name = "TemplateNotFoundError";
  }
}

/**
 * Error for a template whose source exists but cannot be read
 */
export class TemplateLoadError extends WikismithError {
  constructor(templateName: string, filePath: string, cause: string) {
    super(`Failed to load template ${templateName} from ${filePath}: ${cause}`, "TEMPLATE_LOAD_ERROR", {
      templateName,
      filePath,
      cause,
    });
    this.name = "TemplateLoadError";
  }
}

/**
 * Error for a template that (directly or indirectly) invokes itself
 */
export class TemplateCycleError extends WikismithError {
  constructor(public readonly chain: string[]) {
    super(`Template cycle detected: ${chain.join(" -> ")}`, "TEMPLATE_CYCLE", { chain });
    this.name = "TemplateCycleError";
  }
}

/**
 * Error for an expansion that exceeds its depth or iteration bound
 */
export class RecursionLimitError extends WikismithError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "RECURSION_LIMIT", context);
    this.name = "RecursionLimitError";
  }
}
