/**
 * Tests for the offline mock responder
 */

import {
  MockResponder,
  FILLER_PHRASES,
  NO_INPUT_REPLY,
  GREETING_REPLY,
  FAREWELL_REPLY,
  HELP_REPLY,
  WEATHER_REPLY,
  formatTimestamp,
} from '../src/application/services/MockResponder.js';
import { setLogSink, LogSink } from '../src/utils/logger.js';

describe('MockResponder', () => {
  let previousSink: LogSink;

  beforeEach(() => {
    previousSink = setLogSink(() => undefined);
  });

  afterEach(() => {
    setLogSink(previousSink);
  });

  const fixedNow = () => new Date(2024, 0, 5, 9, 3, 7);
  const responder = new MockResponder({ delayMs: 0, random: () => 0, now: fixedNow });

  describe('Keyword rules', () => {
    test('greets on hello', async () => {
      await expect(responder.respond('Hello there')).resolves.toBe(GREETING_REPLY);
    });

    test('says farewell on bye', async () => {
      await expect(responder.respond('bye')).resolves.toBe(FAREWELL_REPLY);
    });

    test('offers help', async () => {
      await expect(responder.respond('I need help')).resolves.toBe(HELP_REPLY);
    });

    test('disclaims weather', async () => {
      await expect(responder.respond('How is the weather')).resolves.toBe(WEATHER_REPLY);
    });

    test('reports the local time', async () => {
      const reply = await responder.respond('what time is it');

      expect(reply).toMatch(/\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}/);
      expect(reply.endsWith('2024-01-05 09:03:07')).toBe(true);
    });

    test('matches case-insensitively and in rule order', async () => {
      await expect(responder.respond('HEY, what is the DATE?')).resolves.toBe(GREETING_REPLY);
    });
  });

  describe('Empty input', () => {
    test.each(['', '   ', '\t'])('returns the no-input reply for %j', async (input) => {
      await expect(responder.respond(input)).resolves.toBe(NO_INPUT_REPLY);
    });
  });

  describe('Filler replies', () => {
    test('echoes the input after a filler phrase', async () => {
      await expect(responder.respond('Tell me about rust')).resolves.toBe(
        "That's an interesting question! Let me think about that... You mentioned: 'Tell me about rust'. What else would you like to know?"
      );
    });

    test('picks the phrase from the random source', async () => {
      const last = new MockResponder({ delayMs: 0, random: () => 0.999 });

      await expect(last.respond('Tell me about rust')).resolves.toBe(
        `${FILLER_PHRASES[9]} You mentioned: 'Tell me about rust'. What else would you like to know?`
      );
    });

    test('has ten phrases', () => {
      expect(FILLER_PHRASES).toHaveLength(10);
    });
  });

  describe('Latency', () => {
    test('waits before answering', async () => {
      const slow = new MockResponder({ delayMs: 50 });
      const started = Date.now();

      await slow.respond('hello');

      expect(Date.now() - started).toBeGreaterThanOrEqual(45);
    });
  });

  test('formatTimestamp pads every field', () => {
    expect(formatTimestamp(new Date(2023, 10, 9, 4, 5, 6))).toBe('2023-11-09 04:05:06');
  });
});
