import { BadRequestException, ConflictException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { TranscriptionsService } from './transcriptions.service';
import { SessionsService } from '../sessions/sessions.service';
import { TranscriptsService } from '../transcripts/transcripts.service';
import { AudioFile, ElevenLabsService } from '../../providers/elevenlabs/elevenlabs.service';

const audio = (filename: string): AudioFile => ({
  filename,
  mimetype: 'audio/mpeg',
  buffer: Buffer.from(filename),
});

const DEMO_TEXT =
  '**Speaker 0**: Mr. John Smith specifically mentioned the breach of contract occurring on July 15th, 2023.' +
  '\n\n**Speaker 1**: We never agreed to those terms in the initial MSA.';

describe('TranscriptionsService', () => {
  let config: ConfigService;
  let elevenLabsService: ElevenLabsService;
  let sessionsService: SessionsService;
  let service: TranscriptionsService;

  beforeEach(() => {
    config = new ConfigService({
      batch: { maxFiles: 2, allowedExtensions: ['mp3', 'wav'] },
      demo: { delayMs: 0 },
      session: { ttlMinutes: 30 },
      elevenlabs: { apiKey: '', baseUrl: 'https://stt.test/v1' },
    });
    elevenLabsService = new ElevenLabsService(config);
    sessionsService = new SessionsService(config);
    service = new TranscriptionsService(
      config,
      elevenLabsService,
      sessionsService,
      new TranscriptsService(),
    );
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('parseKeyterms', () => {
    it('splits on commas and drops blanks', () => {
      expect(service.parseKeyterms(' negligence, ,habeas corpus ,NDA')).toEqual([
        'negligence',
        'habeas corpus',
        'NDA',
      ]);
      expect(service.parseKeyterms(undefined)).toEqual([]);
    });
  });

  describe('processBatch', () => {
    it('returns demo results in demo mode without calling the API', async () => {
      const transcribe = jest.spyOn(elevenLabsService, 'transcribe');
      const session = sessionsService.createSession({ demo_mode: true });

      const response = await service.processBatch(session, [audio('a.mp3'), audio('b.WAV')]);

      expect(transcribe).not.toHaveBeenCalled();
      expect(response.results.map((r) => r.filename)).toEqual(['a.mp3', 'b.WAV']);
      expect(response.results[0].source).toBe('demo');
      expect(response.results[0].text).toBe(DEMO_TEXT);
      expect(response.results[0].entity_count).toBe(3);
      expect(response.errors).toEqual([]);
      expect(response.skipped).toEqual([]);
      expect(session.results).toHaveLength(2);
      expect(session.processing).toBe(false);
    });

    it('processes only the first files up to the batch limit', async () => {
      const session = sessionsService.createSession({ demo_mode: true });

      const response = await service.processBatch(session, [
        audio('a.mp3'),
        audio('b.mp3'),
        audio('c.mp3'),
      ]);

      expect(response.results).toHaveLength(2);
      expect(response.skipped).toEqual(['c.mp3']);
    });

    it('reports files dropped during upload as skipped', async () => {
      const session = sessionsService.createSession({ demo_mode: true });

      const response = await service.processBatch(
        session,
        [audio('a.mp3'), audio('b.mp3')],
        undefined,
        ['c.wav'],
      );

      expect(response.results).toHaveLength(2);
      expect(response.skipped).toEqual(['c.wav']);
    });

    it('checks the type of files dropped during upload', async () => {
      const session = sessionsService.createSession({ demo_mode: true });

      await expect(
        service.processBatch(session, [audio('a.mp3')], undefined, ['notes.txt']),
      ).rejects.toMatchObject({
        response: { code: 'INVALID_INPUT', message: 'Unsupported file type: notes.txt' },
      });
    });

    it('replaces the results of the previous batch', async () => {
      const session = sessionsService.createSession({ demo_mode: true });

      await service.processBatch(session, [audio('a.mp3'), audio('b.mp3')]);
      await service.processBatch(session, [audio('c.mp3')]);

      expect(session.results.map((r) => r.filename)).toEqual(['c.mp3']);
    });

    it('rejects unsupported file types', async () => {
      const session = sessionsService.createSession({ demo_mode: true });

      await expect(
        service.processBatch(session, [audio('a.mp3'), audio('notes.txt')]),
      ).rejects.toBeInstanceOf(BadRequestException);
      expect(session.results).toEqual([]);
    });

    it('rejects an empty upload', async () => {
      const session = sessionsService.createSession({ demo_mode: true });

      await expect(service.processBatch(session, [])).rejects.toMatchObject({
        response: { code: 'INVALID_INPUT' },
      });
    });

    it('requires an API key when demo mode is off', async () => {
      const session = sessionsService.createSession({ demo_mode: false });

      await expect(service.processBatch(session, [audio('a.mp3')])).rejects.toMatchObject({
        response: {
          code: 'API_KEY_REQUIRED',
          message: 'Please provide an API Key or enable Demo Mode',
        },
      });
    });

    it('rejects a second batch while one is running', async () => {
      const session = sessionsService.createSession({ demo_mode: true });
      session.processing = true;

      await expect(service.processBatch(session, [audio('a.mp3')])).rejects.toBeInstanceOf(
        ConflictException,
      );
    });

    it('formats diarized words from the API into speaker turns', async () => {
      const transcribe = jest.spyOn(elevenLabsService, 'transcribe').mockResolvedValue({
        text: 'Hello there',
        language_code: 'en',
        words: [
          { text: 'Hello', speaker_id: 'speaker_0' },
          { text: 'there', speaker_id: 'speaker_1' },
        ],
        entities: [],
      });
      const session = sessionsService.createSession({ api_key: 'test-key' });

      const response = await service.processBatch(session, [audio('a.mp3')], ' NDA, ,Plaintiff Doe ');

      expect(transcribe).toHaveBeenCalledWith(audio('a.mp3'), 'test-key', {
        keyterms: ['NDA', 'Plaintiff Doe'],
      });
      expect(session.results[0]).toMatchObject({
        filename: 'a.mp3',
        text: '**Speaker 0**: Hello\n\n**Speaker 1**: there',
        raw_text: 'Hello there',
        status: 'completed',
        source: 'elevenlabs',
        language_code: 'en',
      });
      expect(response.results[0].display_html).toBe(
        '<strong>Speaker 0</strong>: Hello</p><p><strong>Speaker 1</strong>: there',
      );
    });

    it('keeps the raw text when the API returns no speakers', async () => {
      jest.spyOn(elevenLabsService, 'transcribe').mockResolvedValue({
        text: 'Plain transcript',
        language_code: null,
        words: [{ text: 'Plain' }, { text: 'transcript' }],
        entities: [],
      });
      const session = sessionsService.createSession({ api_key: 'test-key' });

      await service.processBatch(session, [audio('a.mp3')]);

      expect(session.results[0].text).toBe('Plain transcript');
    });

    it('records a failing file and continues with the rest', async () => {
      jest
        .spyOn(elevenLabsService, 'transcribe')
        .mockRejectedValueOnce(new Error('ElevenLabs API error: 500 - boom'))
        .mockResolvedValueOnce({ text: 'ok', language_code: 'en', words: [], entities: [] });
      const session = sessionsService.createSession({ api_key: 'test-key' });

      const response = await service.processBatch(session, [audio('a.mp3'), audio('b.mp3')]);

      expect(response.results.map((r) => r.filename)).toEqual(['b.mp3']);
      expect(response.errors).toEqual([
        { filename: 'a.mp3', message: 'ElevenLabs API error: 500 - boom' },
      ]);
      expect(service.listResults(session).errors).toEqual(response.errors);
      expect(session.processing).toBe(false);
    });
  });
});
