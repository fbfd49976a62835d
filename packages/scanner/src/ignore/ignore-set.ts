import picomatch from 'picomatch';
import { basename, normalizePath, splitPath } from '@leakscan/shared';

export interface IgnoreSetOptions {
  /**
   * Also exclude an entry when the text of a slash-free rule appears anywhere
   * in its name. Broad: `log` excludes `login.py`. Defaults to true.
   */
  substringMatch?: boolean;
}

type Matcher = (input: string) => boolean;

type CompiledRule =
  | { kind: 'path'; rule: string; glob: Matcher; prefix: string }
  | { kind: 'name'; rule: string; glob: Matcher };

// Plain shell globs: no braces, extglobs or `!` negation, and `*` also matches dotfiles.
const GLOB_OPTIONS: picomatch.PicomatchOptions = {
  dot: true,
  nobrace: true,
  noextglob: true,
  nonegate: true,
};

const NEVER: Matcher = () => false;

function compileRule(rule: string): CompiledRule {
  if (rule.includes('/')) {
    const prefix = splitPath(rule).join('/');
    if (prefix.length === 0) {
      return { kind: 'path', rule, glob: NEVER, prefix };
    }
    // Unanchored rules match the trailing components of the path.
    const pattern = rule.startsWith('/') ? prefix : `**/${prefix}`;
    return { kind: 'path', rule, glob: picomatch(pattern, GLOB_OPTIONS), prefix };
  }
  return { kind: 'name', rule, glob: picomatch(rule, GLOB_OPTIONS) };
}

/**
 * Decides whether a root-relative path is excluded from scanning.
 *
 * A path is excluded when any rule matches it:
 * - a rule containing `/` matches by right-anchored glob over path components,
 *   or when the path is the rule's directory prefix or lies beneath it;
 * - a rule without `/` matches the final path component as a glob, or (with
 *   `substringMatch`) when the rule text occurs inside that component.
 *
 * Immutable once built and safe to share between concurrent scans.
 */
export class IgnoreSet {
  readonly rules: readonly string[];
  private readonly compiled: readonly CompiledRule[];
  private readonly substringMatch: boolean;

  constructor(rules: readonly string[], options: IgnoreSetOptions = {}) {
    this.rules = Object.freeze([...rules]);
    this.compiled = this.rules.map(compileRule);
    this.substringMatch = options.substringMatch ?? true;
  }

  isExcluded(relPath: string): boolean {
    return this.matchingRule(relPath) !== undefined;
  }

  /**
   * The first rule, in load order, that excludes the path.
   */
  matchingRule(relPath: string): string | undefined {
    const path = splitPath(normalizePath(relPath)).join('/');
    if (path.length === 0) return undefined;
    const name = basename(path);

    for (const compiled of this.compiled) {
      if (compiled.kind === 'path') {
        if (compiled.glob(path) || isWithin(path, compiled.prefix)) {
          return compiled.rule;
        }
      } else if (
        compiled.glob(name) ||
        (this.substringMatch && name.includes(compiled.rule))
      ) {
        return compiled.rule;
      }
    }
    return undefined;
  }
}

function isWithin(path: string, prefix: string): boolean {
  if (prefix.length === 0) return false;
  return path === prefix || path.startsWith(prefix + '/');
}
