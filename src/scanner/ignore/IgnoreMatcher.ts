import type { IgnoreRules } from '../../types/scanPolicy.js';
import { globToRegExp } from './glob.js';
import { compileRegex, type CompiledRegex } from './compileRegex.js';

/** Tests root-relative POSIX paths (`/dir/file.txt`) against glob and regex ignore rules. */
export class IgnoreMatcher {
  private readonly globMatchers: RegExp[];
  private readonly regexMatchers: CompiledRegex[];

  constructor(rules: IgnoreRules) {
    this.globMatchers = rules.glob.map((pattern) => globToRegExp(pattern));
    this.regexMatchers = rules.regex.map((pattern) => compileRegex(pattern));
  }

  get isEmpty(): boolean {
    return this.globMatchers.length === 0 && this.regexMatchers.length === 0;
  }

  isIgnored(relativePath: string): boolean {
    for (const matcher of this.globMatchers) {
      if (matcher.test(relativePath)) return true;
    }
    for (const matcher of this.regexMatchers) {
      if (matcher.test(relativePath)) return true;
    }
    return false;
  }
}
