import { InterpreterFamily } from '../../types/Runtime';
import { InvalidVersionError } from '../../types/Errors';

const FAMILY_ORDER: Record<InterpreterFamily, number> = {
  cpython: 0,
  pypy: 1,
};

const FAMILY_PREFIX: Record<InterpreterFamily, string> = {
  cpython: '',
  pypy: 'pypy',
};

const USER_INPUT = /^(pypy)?(\d+)\.(\d+)(?:\.(\d+))?$/;

/**
 * Parse a version component the way an unsigned byte is read: digits only,
 * no larger than 255.
 */
export function parseComponent(digits: string): number | null {
  if (!/^\d+$/.test(digits)) {
    return null;
  }
  const value = parseInt(digits, 10);
  return value <= 255 ? value : null;
}

/**
 * Identity of an interpreter build. A missing patch acts as a wildcard when
 * the version is a request.
 */
export class Version {
  constructor(
    readonly family: InterpreterFamily,
    readonly major: number,
    readonly minor: number,
    readonly patch: number | undefined = undefined
  ) {}

  /**
   * Parse user input of the form `["pypy"] major "." minor ["." patch]`.
   */
  static parse(text: string): Version {
    const match = USER_INPUT.exec(text);
    if (!match) {
      throw new InvalidVersionError(text);
    }

    const [, prefix, majorStr, minorStr, patchStr] = match;
    const major = parseComponent(majorStr);
    const minor = parseComponent(minorStr);
    const patch = patchStr === undefined ? undefined : parseComponent(patchStr);

    if (major === null || minor === null || patch === null) {
      throw new InvalidVersionError(text);
    }

    return new Version(prefix ? 'pypy' : 'cpython', major, minor, patch);
  }

  static compare(a: Version, b: Version): number {
    return (
      FAMILY_ORDER[a.family] - FAMILY_ORDER[b.family] ||
      a.major - b.major ||
      a.minor - b.minor ||
      (a.patch ?? -1) - (b.patch ?? -1)
    );
  }

  equals(other: Version): boolean {
    return Version.compare(this, other) === 0;
  }

  /**
   * Whether this release version satisfies `requested`. Not symmetric: a
   * request without a patch accepts any patch, a request with one only
   * accepts that exact build.
   */
  compatible(requested: Version): boolean {
    if (this.equals(requested)) {
      return true;
    }
    return (
      this.family === requested.family &&
      this.major === requested.major &&
      this.minor === requested.minor &&
      requested.patch === undefined
    );
  }

  toString(): string {
    const base = `${FAMILY_PREFIX[this.family]}${this.major}.${this.minor}`;
    return this.patch === undefined ? base : `${base}.${this.patch}`;
  }
}
