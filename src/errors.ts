export class SwatchbookError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * The configuration document could not be loaded or holds values the
 * builder cannot use. Reported before any build stage runs.
 */
export class ConfigurationError extends SwatchbookError {}

/**
 * A header, footer, template page or code example template failed to
 * compile or render.
 */
export class TemplateError extends SwatchbookError {}

/**
 * The source parser produced a page without a file name.
 */
export class ParserContractError extends SwatchbookError {}

export class WarningsAsErrorsError extends SwatchbookError {}
