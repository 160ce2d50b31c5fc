// src/core/modules/errors.ts

export class ModuleNotFoundError extends Error {
  readonly code = "MODULE_NOT_FOUND";

  constructor(
    readonly importPath: string,
    readonly expectedFile: string,
  ) {
    super(`module '${importPath}' not found: expected ${expectedFile}`);
    this.name = "ModuleNotFoundError";
  }
}

export class CircularImportError extends Error {
  readonly code = "CIRCULAR_IMPORT";

  constructor(
    readonly importPath: string,
    readonly file: string,
  ) {
    super(`circular import detected: ${importPath} (${file})`);
    this.name = "CircularImportError";
  }
}

/** A module file that cannot be read, parsed or validated. */
export class ModuleLoadError extends Error {
  readonly code = "MODULE_LOAD";

  constructor(
    readonly file: string,
    readonly reason: string,
  ) {
    super(`cannot load module ${file}: ${reason}`);
    this.name = "ModuleLoadError";
  }
}
