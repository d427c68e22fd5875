/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Error taxonomy shared by the loaders and writers.
 *
 * Every load or save either returns a complete result or throws exactly one
 * of these; callers never see a partially built scene.
 */

export class ObjKitError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ObjKitError';
  }
}

/** A file could not be opened, read or written */
export class IoError extends ObjKitError {
  constructor(
    message: string,
    public readonly path: string,
    cause?: unknown
  ) {
    super(message, { cause });
    this.name = 'IoError';
  }
}

/** A record or binary field is malformed */
export class FormatError extends ObjKitError {
  constructor(
    message: string,
    public readonly source?: string,
    public readonly lineNumber?: number
  ) {
    super(FormatError.describe(message, source, lineNumber));
    this.name = 'FormatError';
  }

  private static describe(message: string, source?: string, lineNumber?: number): string {
    if (source && lineNumber !== undefined) return `${source}:${lineNumber}: ${message}`;
    if (lineNumber !== undefined) return `line ${lineNumber}: ${message}`;
    if (source) return `${source}: ${message}`;
    return message;
  }
}

/** The binary dump does not start with the expected magic constant */
export class MagicMismatchError extends ObjKitError {
  constructor(
    public readonly expected: number,
    public readonly actual: number
  ) {
    super(`Invalid magic bytes: expected 0x${expected.toString(16)}, got 0x${actual.toString(16)}`);
    this.name = 'MagicMismatchError';
  }
}
