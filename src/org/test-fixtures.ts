/**
 * Shared fixtures for org tests.
 */
import { codePointLength } from './chars.js';

/**
 * Build a document whose head drawer marks `answers` (found in `body`) as
 * responses, using 1-based code-point positions the way gptel writes them.
 *
 * Positions must keep the digit count of the `000` placeholders, so fixtures
 * stay between 100 and 999 characters long.
 */
export function annotateDocument(body: string, answers: string[], extraProperties = ''): string {
  const header = (pairs: string): string =>
    `:PROPERTIES:\n${extraProperties}:GPTEL_BOUNDS: ((response ${pairs}))\n:END:\n`;
  const offset = codePointLength(header(answers.map(() => '(000 000)').join(' ')));

  const pairs = answers
    .map((answer) => {
      const index = body.indexOf(answer);
      if (index === -1) throw new Error(`Answer not in body: ${answer}`);
      const start = offset + codePointLength(body.slice(0, index)) + 1;
      return `(${start} ${start + codePointLength(answer)})`;
    })
    .join(' ');

  const text = header(pairs);
  if (codePointLength(text) !== offset) throw new Error('Fixture positions changed width');
  return `${text}${body}`;
}
