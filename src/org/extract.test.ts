import { describe, expect, it } from 'vitest';
import { extractMessages } from './extract.js';

describe('extractMessages', () => {
  it('splits a transcript into a question and its marked answer', () => {
    const text = 'Question:\nHello\nAI Response:\nHi there\n';
    const start = text.indexOf('Hi there');
    expect(start).toBe(29);

    expect(extractMessages(text, [{ start, end: start + 'Hi there'.length }])).toEqual([
      { role: 'user', content: 'Hello', charStart: 0, charEnd: 29, tokenCount: 0 },
      { role: 'assistant', content: 'Hi there', charStart: 29, charEnd: 37, tokenCount: 0 },
    ]);
  });

  it('yields one assistant message for a marker spanning the whole text', () => {
    const text = 'Only the answer';
    expect(extractMessages(text, [{ start: 0, end: text.length }])).toEqual([
      { role: 'assistant', content: 'Only the answer', charStart: 0, charEnd: 15, tokenCount: 0 },
    ]);
  });

  it('sorts markers and alternates roles', () => {
    const text = 'aaa BBB ccc DDD eee';
    const messages = extractMessages(text, [
      { start: 12, end: 15 },
      { start: 4, end: 7 },
    ]);
    expect(messages.map((m) => [m.role, m.content, m.charStart, m.charEnd])).toEqual([
      ['user', 'aaa', 0, 4],
      ['assistant', 'BBB', 4, 7],
      ['user', 'ccc', 7, 12],
      ['assistant', 'DDD', 12, 15],
      ['user', 'eee', 15, 19],
    ]);
  });

  it('drops spans that are empty after stripping', () => {
    expect(
      extractMessages('A  \n B', [
        { start: 0, end: 1 },
        { start: 5, end: 6 },
      ]).map((m) => [m.role, m.content])
    ).toEqual([
      ['assistant', 'A'],
      ['assistant', 'B'],
    ]);
  });

  it('returns nothing without markers', () => {
    expect(extractMessages('Just notes', [])).toEqual([]);
  });

  it('keeps raw span offsets when stripping shortens the content', () => {
    const text = '#+begin_quote\nquoted\n#+end_quote\nReply here';
    expect(extractMessages(text, [{ start: 33, end: 43 }])).toEqual([
      { role: 'user', content: 'quoted', charStart: 0, charEnd: 33, tokenCount: 0 },
      { role: 'assistant', content: 'Reply here', charStart: 33, charEnd: 43, tokenCount: 0 },
    ]);
  });

  // Overlap is the caller's problem: the sweep repeats the shared text.
  it('does not repair overlapping markers', () => {
    const messages = extractMessages('abcdefghij', [
      { start: 0, end: 5 },
      { start: 3, end: 8 },
    ]);
    expect(messages.map((m) => [m.role, m.content])).toEqual([
      ['assistant', 'abcde'],
      ['assistant', 'defgh'],
      ['user', 'ij'],
    ]);
  });

  it('does not mutate the marker list', () => {
    const markers = [
      { start: 5, end: 6 },
      { start: 0, end: 1 },
    ];
    extractMessages('A  \n B', markers);
    expect(markers).toEqual([
      { start: 5, end: 6 },
      { start: 0, end: 1 },
    ]);
  });
});
