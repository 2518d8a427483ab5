import { ServiceUnavailableException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { ConversationContextStore } from '../context/conversation-context.store';
import { IntentDispatcherService } from '../dispatch/intent-dispatcher.service';
import { EntityExtractionService } from '../entities/entity-extraction.service';
import { PatternMatcherService } from '../entities/pattern-matcher.service';
import { GeneralChatFallback } from '../handlers/general-chat.fallback';
import { HandlerRegistry } from '../handlers/handler.registry';
import { NlpGatewayService } from '../nlp-gateway/nlp-gateway.service';
import { ClassifierModelStore } from '../nlu/classifier-model.store';
import { IntentClassifierService } from '../nlu/intent-classifier.service';
import { IntentSamplesLoader } from '../nlu/intent-samples.loader';
import type { IntentClassification } from '../nlu/intent.types';
import { OllamaService } from '../ollama/ollama.service';
import { AssistantService } from './assistant.service';

function classifiedAs(intent: string, confidence = 0.9): IntentClassification {
  return { status: 'ok', intent, confidence, tokens: [], ranking: [] };
}

describe('AssistantService', () => {
  let classifier: IntentClassifierService;
  let gateway: NlpGatewayService;
  let ollama: OllamaService;
  let store: ConversationContextStore;
  let registry: HandlerRegistry;
  let dispatcher: IntentDispatcherService;
  let events: EventEmitter2;
  let assistant: AssistantService;

  beforeEach(() => {
    const config = new ConfigService({ HANDLER_TIMEOUT_MS: '1000' });
    events = new EventEmitter2();
    gateway = new NlpGatewayService(config);
    ollama = new OllamaService(config);
    store = new ConversationContextStore(config);
    registry = new HandlerRegistry();
    classifier = new IntentClassifierService(
      config,
      new ClassifierModelStore(config),
      new IntentSamplesLoader(config),
    );
    dispatcher = new IntentDispatcherService(
      config,
      registry,
      new GeneralChatFallback(ollama, events),
      gateway,
      store,
      events,
    );
    assistant = new AssistantService(
      config,
      classifier,
      new EntityExtractionService(new PatternMatcherService(), gateway, events),
      gateway,
      store,
      dispatcher,
      events,
    );

    jest.spyOn(gateway, 'analyze').mockResolvedValue([]);
    jest.spyOn(gateway, 'specializedNer').mockResolvedValue([]);
    jest.spyOn(gateway, 'sentiment').mockResolvedValue({ label: 'NEUTRAL', score: 0.7 });
    jest.spyOn(ollama, 'generate').mockResolvedValue('Chat reply.');
    registry.register({
      name: 'time',
      description: 'Tells the current time',
      disambiguationLabel: 'current time',
      canHandle: () => false,
      handle: () => 'It is noon.',
    });
  });

  it('classifies, dispatches and records a turn', async () => {
    jest.spyOn(classifier, 'classify').mockReturnValue(classifiedAs('INTENT_GET_TIME'));

    const response = await assistant.process('what time is it', 'en');

    expect(response).toEqual({
      intent: 'INTENT_GET_TIME',
      confidence: 0.9,
      language: 'en',
      entities: [],
      sentiment: { label: 'NEUTRAL', score: 0.7 },
      responseText: 'It is noon.',
      handlerUsed: 'time',
      route: 'mapped',
      status: 'ok',
      degradedSignals: [],
    });

    const context = store.getContextForProcessing();
    expect(context.history.map((t) => [t.speaker, t.text])).toEqual([
      ['user', 'what time is it'],
      ['assistant', 'It is noon.'],
    ]);
    expect(context.history[0].annotations).toEqual({
      intent: 'INTENT_GET_TIME',
      confidence: 0.9,
      entities: [],
      sentiment: { label: 'NEUTRAL', score: 0.7 },
      language: 'en',
    });
    expect(context.history[1].annotations).toEqual({
      intent: 'INTENT_GET_TIME',
      handlerUsed: 'time',
    });
    expect(context.turnData).toEqual({ conversation_language: 'en' });
  });

  it('uses the default language for an unsupported hint', async () => {
    const classify = jest
      .spyOn(classifier, 'classify')
      .mockReturnValue(classifiedAs('INTENT_GREET'));

    const response = await assistant.process('bonjour', 'fr');

    expect(classify).toHaveBeenCalledWith('bonjour', 'es');
    expect(response.language).toBe('es');
    expect(response.responseText).toBe('¡Hola! ¿En qué puedo ayudarte?');
  });

  it.each([['   '], [''], [42], [undefined]])(
    'rejects empty input %p without recording anything',
    async (text) => {
      const classify = jest.spyOn(classifier, 'classify');

      const response = await assistant.process(text);

      expect(response).toEqual({
        intent: 'ERROR_EMPTY_INPUT',
        confidence: 0,
        language: 'es',
        entities: [],
        sentiment: null,
        responseText: 'No te he entendido. ¿Puedes repetirlo?',
        handlerUsed: null,
        route: null,
        status: 'error',
        errorKind: 'empty_input',
        degradedSignals: [],
      });
      expect(classify).not.toHaveBeenCalled();
      expect(store.size).toBe(0);
    },
  );

  it('answers through the fallback when no classifier is available', async () => {
    const response = await assistant.process('cuéntame un chiste', 'es');

    expect(response).toMatchObject({
      intent: 'ERROR_CLASSIFIER_UNAVAILABLE',
      confidence: 0,
      responseText: 'Chat reply.',
      handlerUsed: 'general_chat',
      route: 'fallback',
      status: 'degraded',
      errorKind: 'classifier_unavailable',
      degradedSignals: ['intent'],
    });
    expect(store.size).toBe(2);
  });

  it('degrades only the signals whose collaborators failed', async () => {
    jest.spyOn(classifier, 'classify').mockReturnValue(classifiedAs('INTENT_GET_TIME'));
    jest.spyOn(gateway, 'analyze').mockRejectedValue(new ServiceUnavailableException('down'));
    jest
      .spyOn(gateway, 'specializedNer')
      .mockRejectedValue(new ServiceUnavailableException('down'));
    jest.spyOn(gateway, 'sentiment').mockRejectedValue(new ServiceUnavailableException('down'));

    const response = await assistant.process('qué hora es', 'es');

    expect(response).toMatchObject({
      intent: 'INTENT_GET_TIME',
      sentiment: null,
      responseText: 'It is noon.',
      status: 'ok',
      degradedSignals: ['entities.general', 'entities.specialized', 'sentiment'],
    });
  });

  it('reports a failing handler as degraded', async () => {
    jest.spyOn(classifier, 'classify').mockReturnValue(classifiedAs('INTENT_PLAY_MUSIC'));
    registry.register({
      name: 'music',
      description: 'Plays music',
      disambiguationLabel: 'play music',
      canHandle: () => true,
      handle: () => {
        throw new Error('player offline');
      },
    });

    const response = await assistant.process('play jazz', 'en');

    expect(response).toMatchObject({
      responseText: 'Sorry, something went wrong with music.',
      handlerUsed: 'music',
      status: 'degraded',
      errorKind: 'handler_failed',
    });
  });

  it('does not record an assistant turn after clearing the context', async () => {
    jest.spyOn(classifier, 'classify').mockReturnValue(classifiedAs('INTENT_GET_TIME'));
    await assistant.process('what time is it', 'en');
    jest.spyOn(classifier, 'classify').mockReturnValue(classifiedAs('INTENT_CLEAR_CONTEXT'));

    const response = await assistant.process('forget everything', 'en');

    expect(response.responseText).toBe("I've cleared our conversation.");
    expect(store.size).toBe(0);
  });

  it('turns unexpected errors into an apology', async () => {
    jest.spyOn(classifier, 'classify').mockReturnValue(classifiedAs('INTENT_GET_TIME'));
    jest.spyOn(dispatcher, 'dispatch').mockRejectedValue(new Error('unexpected'));

    const response = await assistant.process('qué hora es', 'es');

    expect(response).toMatchObject({
      intent: 'ERROR_INTERNAL',
      responseText: 'Lo siento, ha ocurrido un error interno.',
      status: 'error',
      errorKind: 'internal',
    });
  });

  it('processes concurrent calls one turn at a time', async () => {
    jest.spyOn(classifier, 'classify').mockReturnValue(classifiedAs('INTENT_PLAY_MUSIC'));
    let calls = 0;
    registry.register({
      name: 'music',
      description: 'Plays music',
      disambiguationLabel: 'play music',
      canHandle: () => true,
      handle: () => {
        calls += 1;
        return calls === 1
          ? new Promise<string>((resolve) => setTimeout(() => resolve('first'), 20))
          : 'second';
      },
    });

    await Promise.all([assistant.process('one', 'en'), assistant.process('two', 'en')]);

    expect(store.getContextForProcessing().history.map((t) => t.text)).toEqual([
      'one',
      'first',
      'two',
      'second',
    ]);
  });

  it('clears the context only after the turn in progress is recorded', async () => {
    jest.spyOn(classifier, 'classify').mockReturnValue(classifiedAs('INTENT_PLAY_MUSIC'));
    registry.register({
      name: 'music',
      description: 'Plays music',
      disambiguationLabel: 'play music',
      canHandle: () => true,
      handle: () => new Promise<string>((resolve) => setTimeout(() => resolve('Playing.'), 20)),
    });

    const [response, cleared] = await Promise.all([
      assistant.process('play something', 'en'),
      assistant.clearContext(),
    ]);

    expect(response.responseText).toBe('Playing.');
    expect(cleared).toEqual({ discardedTurns: 2 });
    expect(store.size).toBe(0);
  });

  it('keeps serving turns after a hint that is not a string', async () => {
    jest.spyOn(classifier, 'classify').mockReturnValue(classifiedAs('INTENT_GET_TIME'));

    const first = await assistant.process('qué hora es', 42);
    const second = await assistant.process('what time is it', 'en');

    expect(first.language).toBe('es');
    expect(first.status).toBe('ok');
    expect(second.language).toBe('en');
    expect(second.responseText).toBe('It is noon.');
  });

  it('emits an event for each classified intent', async () => {
    jest.spyOn(classifier, 'classify').mockReturnValue(classifiedAs('INTENT_GET_TIME', 0.75));
    const emit = jest.spyOn(events, 'emit');

    await assistant.process('what time is it', 'en');

    expect(emit).toHaveBeenCalledWith('intent.classified', {
      rawText: 'what time is it',
      intent: 'INTENT_GET_TIME',
      confidence: 0.75,
      language: 'en',
    });
  });

  it('exposes and clears the conversation context', async () => {
    jest.spyOn(classifier, 'classify').mockReturnValue(classifiedAs('INTENT_GET_TIME'));
    await assistant.process('what time is it', 'en');

    expect(assistant.getContext().lastAssistantResponse).toBe('It is noon.');
    await expect(assistant.clearContext()).resolves.toEqual({ discardedTurns: 2 });
    expect(assistant.getContext().history).toEqual([]);
  });
});
