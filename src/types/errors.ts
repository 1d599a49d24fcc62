/**
 * Error types raised by the dump pipeline
 */

export class DumpError extends Error {
  constructor(message?: string) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = new.target.name;
  }
}

/**
 * A required input (binary, metadata, toolchain folder or marker file) is absent
 */
export class InputNotFoundError extends DumpError {
  constructor(
    readonly path: string,
    message = `File ${path} does not exist`,
  ) {
    super(message);
  }
}

/**
 * The analysis collaborator produced no images
 */
export class AnalysisFailureError extends DumpError {
  constructor(
    readonly path: string,
    message = `No images could be loaded from ${path}`,
  ) {
    super(message);
  }
}

/**
 * Layout/sort pair with no dispatch strategy
 */
export class UnsupportedCombinationError extends DumpError {
  constructor(
    readonly layout: string,
    readonly sort: string,
  ) {
    super(`Unsupported layout/sort combination: ${layout}/${sort}`);
  }
}

/**
 * Solution output was requested without resolved toolchain folders
 */
export class MissingToolchainError extends DumpError {
  constructor() {
    super("Solution output requires resolved toolchain paths");
  }
}

/**
 * Wildcard path shape the resolver refuses to guess about
 */
export class UnsupportedWildcardPathError extends DumpError {
  constructor(
    readonly path: string,
    reason: string,
  ) {
    super(`Unsupported wildcard path ${path}: ${reason}`);
  }
}
