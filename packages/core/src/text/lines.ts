import { annotate } from './annotate';
import type { AnnotatedToken, StageSet } from './types';

/**
 * Annotate `text` one `\n`-separated line at a time.
 *
 * Each line is tokenized on its own, then its offsets are shifted so they point into `text`
 * rather than into the line. A trailing newline yields a final empty line.
 */
export function* iterLinesAnnotated(
  text: string,
  known: StageSet,
  learning: StageSet,
): Generator<AnnotatedToken[], void, undefined> {
  let offset = 0;
  for (const line of text.split('\n')) {
    const { tokens } = annotate(line, known, learning);
    yield tokens.map((token) => ({
      ...token,
      start: token.start + offset,
      end: token.end + offset,
    }));
    offset += line.length + 1;
  }
}
