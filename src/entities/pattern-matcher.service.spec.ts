import { PatternMatcherService } from './pattern-matcher.service';

describe('PatternMatcherService', () => {
  const matcher = new PatternMatcherService();
  const reference = new Date(2026, 9, 19, 9, 30);

  it('finds e-mail addresses', () => {
    expect(matcher.extract('write to ana@example.com please', 'en', reference)).toEqual([
      { text: 'ana@example.com', label: 'EMAIL', start: 9, end: 24, source: 'rule' },
    ]);
  });

  it('finds URLs without trailing punctuation', () => {
    expect(matcher.extract('open https://example.com/docs.', 'en', reference)).toEqual([
      { text: 'https://example.com/docs', label: 'URL', start: 5, end: 29, source: 'rule' },
    ]);
  });

  it('finds phone numbers', () => {
    const phone = matcher
      .extract('llama al 612 345 678 por favor', 'es', reference)
      .find((e) => e.label === 'PHONE_NUMBER');
    expect(phone).toEqual({
      text: '612 345 678',
      label: 'PHONE_NUMBER',
      start: 9,
      end: 20,
      source: 'rule',
    });
  });

  it('takes quoted titles without their quotes', () => {
    const title = matcher
      .extract('play "Bohemian Rhapsody" loud', 'en', reference)
      .find((e) => e.label === 'WORK_OF_ART');
    expect(title).toEqual({
      text: 'Bohemian Rhapsody',
      label: 'WORK_OF_ART',
      start: 6,
      end: 23,
      source: 'rule',
    });
  });

  it('labels a day without an hour as DATE', () => {
    expect(matcher.extract('remind me tomorrow', 'en', reference)).toEqual([
      { text: 'tomorrow', label: 'DATE', start: 10, end: 18, source: 'rule' },
    ]);
  });

  it('labels an explicit hour as TIME', () => {
    const time = matcher
      .extract('wake me up at 7 pm', 'en', reference)
      .find((e) => e.label === 'TIME');
    expect(time?.text).toMatch(/7 pm$/);
    expect(time?.end).toBe(18);
  });

  it('parses Spanish dates with the Spanish parser', () => {
    const date = matcher
      .extract('recuérdame mañana', 'es', reference)
      .find((e) => e.label === 'DATE');
    expect(date).toEqual({
      text: 'mañana',
      label: 'DATE',
      start: 11,
      end: 17,
      source: 'rule',
    });
  });

  it('discards a later match that overlaps an earlier one', () => {
    expect(matcher.extract('open "https://example.com"', 'en', reference)).toEqual([
      { text: 'https://example.com', label: 'URL', start: 6, end: 25, source: 'rule' },
    ]);
  });

  it('returns nothing for plain text', () => {
    expect(matcher.extract('turn up the volume', 'en', reference)).toEqual([]);
  });
});
