import { ServiceUnavailableException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { NlpGatewayService } from '../nlp-gateway/nlp-gateway.service';
import { EntityExtractionService } from './entity-extraction.service';
import { PatternMatcherService } from './pattern-matcher.service';

// "play "Yesterday" by The Beatles"
const TEXT = 'play "Yesterday" by The Beatles';

describe('EntityExtractionService', () => {
  let gateway: NlpGatewayService;
  let events: EventEmitter2;
  let service: EntityExtractionService;

  beforeEach(() => {
    gateway = new NlpGatewayService(new ConfigService({}));
    events = new EventEmitter2();
    service = new EntityExtractionService(new PatternMatcherService(), gateway, events);
  });

  it('merges the three sources by priority', async () => {
    jest.spyOn(gateway, 'analyze').mockResolvedValue([
      { text: 'Yesterday', label: 'DATE', start: 6, end: 15 },
      { text: 'Beatles', label: 'PERSON', start: 24, end: 31 },
    ]);
    jest
      .spyOn(gateway, 'specializedNer')
      .mockResolvedValue([{ text: 'The Beatles', label: 'ORG', start: 20, end: 31, score: 0.93 }]);

    await expect(service.extract(TEXT, 'en')).resolves.toEqual({
      entities: [
        { text: 'Yesterday', label: 'WORK_OF_ART', start: 6, end: 15, source: 'rule' },
        {
          text: 'The Beatles',
          label: 'ORG',
          start: 20,
          end: 31,
          score: 0.93,
          source: 'specialized',
        },
      ],
      failedSources: [],
    });
    expect(gateway.analyze).toHaveBeenCalledWith(TEXT, 'en');
    expect(gateway.specializedNer).toHaveBeenCalledWith(TEXT);
  });

  it('treats a failing tagger as contributing nothing', async () => {
    const emit = jest.spyOn(events, 'emit');
    jest
      .spyOn(gateway, 'analyze')
      .mockRejectedValue(new ServiceUnavailableException('NLP service analyze unreachable'));
    jest
      .spyOn(gateway, 'specializedNer')
      .mockResolvedValue([{ text: 'The Beatles', label: 'ORG', start: 20, end: 31 }]);

    const result = await service.extract(TEXT, 'en');

    expect(result.failedSources).toEqual(['general']);
    expect(result.entities.map((e) => e.source)).toEqual(['rule', 'specialized']);
    expect(emit).toHaveBeenCalledWith('collaborator.failed', {
      collaborator: 'general-ner',
      message: 'NLP service analyze unreachable',
    });
  });

  it('still returns rule entities when both taggers fail', async () => {
    jest.spyOn(gateway, 'analyze').mockRejectedValue(new Error('down'));
    jest.spyOn(gateway, 'specializedNer').mockRejectedValue(new Error('down'));

    const result = await service.extract('mail bob@example.org', 'en');

    expect(result).toEqual({
      entities: [
        { text: 'bob@example.org', label: 'EMAIL', start: 5, end: 20, source: 'rule' },
      ],
      failedSources: ['general', 'specialized'],
    });
  });

  it('compares tagger spans with rule spans on text with emoji', async () => {
    const fetchMock = jest.spyOn(global, 'fetch').mockImplementation(async (input) =>
      new Response(
        JSON.stringify({
          entities: String(input).endsWith('/ner')
            ? [{ text: 'Madrid', label: 'GPE', start: 8, end: 14 }]
            : [],
        }),
        { status: 200, headers: { 'Content-Type': 'application/json' } },
      ),
    );

    try {
      await expect(service.extract('😀😀 5 pm Madrid', 'en')).resolves.toEqual({
        entities: [
          { text: '5 pm', label: 'TIME', start: 5, end: 9, source: 'rule' },
          { text: 'Madrid', label: 'GPE', start: 10, end: 16, source: 'specialized' },
        ],
        failedSources: [],
      });
    } finally {
      fetchMock.mockRestore();
    }
  });
});
