import type { SourceLocation } from "./spanned/location.js";

export class ScriptAstError extends Error {
  readonly location: SourceLocation;

  constructor(message: string, location: SourceLocation) {
    super(message);
    this.name = "ScriptAstError";
    this.location = location;
  }
}

export class ConversionDepthError extends ScriptAstError {
  readonly maxDepth: number;

  constructor(maxDepth: number, location: SourceLocation) {
    super(
      `Nesting deeper than ${maxDepth} levels at offset ${location.start}`,
      location
    );
    this.name = "ConversionDepthError";
    this.maxDepth = maxDepth;
  }
}
