import type { Language } from '../common/language';
import type { ContextSnapshot } from '../context/context.types';
import { DateHandler } from './date.handler';
import { MusicHandler } from './music.handler';
import { TimeHandler } from './time.handler';

function contextIn(language: Language): ContextSnapshot {
  return {
    history: [],
    lastUserUtterance: null,
    lastAssistantResponse: null,
    previousUserUtterance: null,
    previousAssistantResponse: null,
    turnData: { conversation_language: language },
  };
}

describe('built-in handlers', () => {
  afterEach(() => {
    jest.useRealTimers();
  });

  describe('TimeHandler', () => {
    const handler = new TimeHandler();

    it('tells the local time in the conversation language', () => {
      jest.useFakeTimers({ now: new Date(2026, 9, 19, 14, 5) });

      expect(handler.handle('qué hora es', [], contextIn('es'))).toBe('Son las 14:05.');
      expect(handler.handle('what time is it', [], contextIn('en'))).toBe("It's 14:05.");
    });

    it('uses the singular for one o’clock in Spanish', () => {
      jest.useFakeTimers({ now: new Date(2026, 9, 19, 1, 7) });
      expect(handler.handle('qué hora es', [], contextIn('es'))).toBe('Es la 1:07.');
    });

    it('claims questions about the time', () => {
      expect(handler.canHandle('¿Qué hora es?')).toBe(true);
      expect(handler.canHandle('what time is it')).toBe(true);
      expect(handler.canHandle('pon música')).toBe(false);
    });

    it('apologizes in the requested language', () => {
      expect(handler.failureMessage('en')).toBe("Sorry, I couldn't read the clock.");
    });
  });

  describe('DateHandler', () => {
    const handler = new DateHandler();

    it('tells the date with Spanish day and month names', () => {
      jest.useFakeTimers({ now: new Date(2026, 9, 19, 10, 0) });

      expect(handler.handle('qué día es hoy', [], contextIn('es'))).toBe(
        'Hoy es lunes, 19 de octubre de 2026.',
      );
      expect(handler.handle("what's the date", [], contextIn('en'))).toBe(
        'Today is Monday, October 19, 2026.',
      );
    });

    it('claims questions about the date', () => {
      expect(handler.canHandle('qué día es hoy')).toBe(true);
      expect(handler.canHandle('what is the date today')).toBe(true);
      expect(handler.canHandle('play some jazz')).toBe(false);
    });
  });

  describe('MusicHandler', () => {
    const handler = new MusicHandler();

    it('plays a title found among the entities', () => {
      const result = handler.handle(
        'pon "Imagine" de John Lennon',
        [
          { text: 'John Lennon', label: 'PERSON', start: 16, end: 27, source: 'general' },
          { text: 'Imagine', label: 'WORK_OF_ART', start: 5, end: 12, source: 'rule' },
        ],
        contextIn('es'),
      );

      expect(result).toEqual({
        response: 'Reproduciendo "Imagine".',
        contextUpdates: { last_music_query: 'Imagine' },
      });
    });

    it('falls back to the words after the play verb', () => {
      expect(handler.handle('Play some jazz!', [], contextIn('en'))).toEqual({
        response: 'Playing "some jazz".',
        contextUpdates: { last_music_query: 'some jazz' },
      });
    });

    it('asks what to play when nothing was named', () => {
      expect(handler.handle('music', [], contextIn('en'))).toEqual({
        response: 'What would you like me to play?',
      });
    });

    it('claims requests to play music', () => {
      expect(handler.canHandle('pon música')).toBe(true);
      expect(handler.canHandle('play the next song')).toBe(true);
      expect(handler.canHandle('qué hora es')).toBe(false);
    });
  });
});
