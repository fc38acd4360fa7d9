const REGEX_SPECIAL = /[.*+?^${}()|[\]\\]/g;

function escapeRegex(text: string): string {
  return text.replace(REGEX_SPECIAL, '\\$&');
}

/**
 * Compiles an ignore glob into a RegExp over root-relative paths such as
 * `/dir/file.txt`. A leading `/` anchors the pattern at the root; otherwise
 * it may match at any depth. A trailing `/**` also matches the directory
 * itself, so whole subtrees can be pruned. `[!abc]` and `[^abc]` negate a
 * class.
 */
export function globToRegExp(pattern: string): RegExp {
  const anchored = pattern.startsWith('/');
  let body = pattern;
  let subtree = false;
  if (body.endsWith('/**')) {
    body = body.slice(0, -3);
    subtree = true;
  }

  let out = '';
  let i = 0;
  while (i < body.length) {
    const ch = body[i];
    switch (ch) {
      case '\\': {
        const next = body[i + 1];
        out += next === undefined ? '\\\\' : escapeRegex(next);
        i += next === undefined ? 1 : 2;
        break;
      }
      case '*':
        if (body[i + 1] === '*') {
          out += '.*';
          i += 2;
        } else {
          out += '[^/]*';
          i += 1;
        }
        break;
      case '?':
        out += '[^/]';
        i += 1;
        break;
      case '[': {
        const end = body.indexOf(']', i + 1);
        if (end === -1) {
          out += '\\[';
          i += 1;
        } else {
          let members = body.slice(i + 1, end);
          const negated = members.startsWith('!') || members.startsWith('^');
          if (negated) members = members.slice(1);
          // A negated class never crosses a path separator.
          const escaped = members.replace(/\\/g, '\\\\');
          out += negated ? `[^/${escaped}]` : `[${escaped}]`;
          i = end + 1;
        }
        break;
      }
      default:
        out += escapeRegex(ch);
        i += 1;
    }
  }

  const prefix = anchored ? '^' : '^(?:.*/)?';
  const suffix = subtree ? '(?:/.*)?' : '';
  return new RegExp(`${prefix}${out}${suffix}$`);
}
