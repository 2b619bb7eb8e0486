/**
 * Comment Stripping
 *
 * `//` starts a comment that runs to the end of the line. Stripping happens
 * on raw lines before tokenization, so a `//` inside a quoted literal also
 * starts a comment.
 */

export function stripComments(source: string): string {
  return source
    .split('\n')
    .map((line) => {
      const start = line.indexOf('//');
      return start >= 0 ? line.slice(0, start) : line;
    })
    .join('\n');
}
