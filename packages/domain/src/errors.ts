export type PipelineErrorKind =
  | "ParseError"
  | "UnsupportedElement"
  | "EmptyDrawing"
  | "DegeneratePath"
  | "InvalidAnchor"
  | "CorruptRoute"
  | "InvalidParameters";

export abstract class PipelineError extends Error {
  abstract readonly kind: PipelineErrorKind;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class ParseError extends PipelineError {
  readonly kind = "ParseError";
}

export class UnsupportedElement extends PipelineError {
  readonly kind = "UnsupportedElement";
  readonly element: string;

  constructor(element: string) {
    super(`Drawing contains unsupported element <${element}>.`);
    this.element = element;
  }
}

export class EmptyDrawing extends PipelineError {
  readonly kind = "EmptyDrawing";

  constructor(message = "Drawing contains no path outlines.") {
    super(message);
  }
}

export class DegeneratePath extends PipelineError {
  readonly kind = "DegeneratePath";
}

export class InvalidAnchor extends PipelineError {
  readonly kind = "InvalidAnchor";
}

export class CorruptRoute extends PipelineError {
  readonly kind = "CorruptRoute";
}

export class InvalidParameters extends PipelineError {
  readonly kind = "InvalidParameters";
}

export function isPipelineError(value: unknown): value is PipelineError {
  return value instanceof PipelineError;
}
