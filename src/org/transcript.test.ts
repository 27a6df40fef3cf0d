import { describe, expect, it } from 'vitest';
import { groupByDay, makeTopic, parseExportDate, parseTranscript } from './transcript.js';

const conversation = (question: string, answer: string): string =>
  `Question:\n${question}\nAI Response:\n${answer}\n`;

describe('parseTranscript', () => {
  it('splits on marker lines and drops empty turns', () => {
    const text = 'Preamble\nQuestion:\nWhat is Org?\nAI Response:\nAn outliner.\n\nQuestion:\n\nAI Response:\nDone\n';
    expect(parseTranscript(text)).toEqual([
      { role: 'user', content: 'What is Org?' },
      { role: 'assistant', content: 'An outliner.' },
      { role: 'assistant', content: 'Done' },
    ]);
  });

  it('accepts CRLF and trailing spaces after markers', () => {
    expect(parseTranscript('Question:  \r\nHi\r\nAI Response:\r\nHello\r\n')).toEqual([
      { role: 'user', content: 'Hi' },
      { role: 'assistant', content: 'Hello' },
    ]);
  });

  it('keeps marker words that are part of a sentence', () => {
    expect(parseTranscript('Question:\nQuestion: why?\n')).toEqual([
      { role: 'user', content: 'Question: why?' },
    ]);
  });
});

describe('makeTopic', () => {
  it('uses the first line of the first user message', () => {
    expect(
      makeTopic([
        { role: 'assistant', content: 'Hi' },
        { role: 'user', content: 'Plan the week\nwith details' },
      ])
    ).toBe('Plan the week');
  });

  it('falls back to a default topic', () => {
    expect(makeTopic([])).toBe('Conversation');
    expect(makeTopic([{ role: 'assistant', content: 'Only me' }])).toBe('Conversation');
  });

  it('truncates long topics', () => {
    expect(makeTopic([{ role: 'user', content: 'w'.repeat(80) }])).toBe(`${'w'.repeat(57)}...`);
  });
});

describe('parseExportDate', () => {
  it('parses the mobile export format', () => {
    expect(parseExportDate('1/8/25, 10:16 PM')).toEqual({
      day: '2025-01-08',
      sortKey: Date.UTC(2025, 0, 8, 22, 16),
    });
  });

  it('handles midnight and the two-digit year pivot', () => {
    expect(parseExportDate('12/31/99, 12:05 AM')).toEqual({
      day: '1999-12-31',
      sortKey: Date.UTC(1999, 11, 31, 0, 5),
    });
  });

  it('parses ISO timestamps', () => {
    expect(parseExportDate('2024-06-01T09:30:00Z')).toEqual({
      day: '2024-06-01',
      sortKey: Date.parse('2024-06-01T09:30:00Z'),
    });
  });

  it('rejects impossible or unknown dates', () => {
    expect(parseExportDate('2/30/24, 1:00 PM')).toBeUndefined();
    expect(parseExportDate('1/8/25, 13:00 PM')).toBeUndefined();
    expect(parseExportDate('yesterday')).toBeUndefined();
  });
});

describe('groupByDay', () => {
  it('groups by day, sorts by time and reports skipped entries', () => {
    const { days, warnings } = groupByDay([
      { date: '1/9/25, 9:00 AM', conversation: conversation('A?', 'A!') },
      { date: '1/8/25, 10:16 PM', conversation: conversation('B?', 'B!') },
      { date: '1/8/25, 8:00 AM', conversation: conversation('C?', 'C!') },
      { date: 'bad', conversation: conversation('D?', 'D!') },
      { date: '1/8/25, 9:00 AM', conversation: 'no markers here' },
    ]);

    expect(days.map((day) => [day.date, day.conversations.map((c) => c.topic)])).toEqual([
      ['2025-01-08', ['C?', 'B?']],
      ['2025-01-09', ['A?']],
    ]);
    expect(days[0]?.conversations[0]?.messages).toEqual([
      { role: 'user', content: 'C?' },
      { role: 'assistant', content: 'C!' },
    ]);
    expect(warnings.map((w) => [w.code, w.message])).toEqual([
      ['INVALID_DATE', 'Skipping entry 3: unrecognized date "bad"'],
      ['EMPTY_CONVERSATION', 'Skipping entry 4: no messages'],
    ]);
  });
});
