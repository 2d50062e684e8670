import { describe, it, expect } from '@jest/globals';
import { DEFAULT_PROMPTS } from '@/config/providers.js';
import {
  ScriptParseError,
  buildGenerationContext,
  buildPlainScriptText,
  buildScriptText,
  extractKeyEvents,
  parseScriptResponse,
  type CharacterWithVoice,
} from '@/shared/script.js';
import type { Script } from '@/types/pipeline.js';

const script: Script = {
  story_title: 'The Lighthouse',
  genre_tone: 'mystery',
  approx_duration_minutes: 5,
  lines: [
    { speaker: 'Narrator', voice_id: 'v1', text: 'Night falls.', sound_effect: 'waves crashing' },
    { speaker: '', voice_id: 'v2', text: 'Who is there?', sound_effect: null },
  ],
};

const character: CharacterWithVoice = {
  id: 'c1',
  projectId: 'p1',
  voiceId: 'voice-1',
  role: 'Narrator',
  characterName: 'Keeper',
  sortOrder: 0,
  createdAt: new Date('2026-01-01T00:00:00Z'),
  voice: null,
};

function captureParseError(response: string): ScriptParseError {
  try {
    parseScriptResponse(response);
  } catch (error) {
    if (error instanceof ScriptParseError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected parseScriptResponse to throw');
}

describe('parseScriptResponse', () => {
  it('extracts JSON from a fenced reply and fills missing fields', () => {
    const reply =
      'Here you go:\n```json\n{"story_title":"A","genre_tone":"B","lines":[{"speaker":"N","text":"hello"}]}\n```';

    expect(parseScriptResponse(reply)).toEqual({
      story_title: 'A',
      genre_tone: 'B',
      approx_duration_minutes: 1,
      lines: [{ speaker: 'N', voice_id: '', text: 'hello', sound_effect: null }],
    });
  });

  it('keeps a reported duration and stringifies voice ids', () => {
    const parsed = parseScriptResponse(
      JSON.stringify({
        story_title: 'A',
        genre_tone: 'B',
        approx_duration_minutes: 7,
        lines: [{ speaker: 'N', voice_id: 42, text: 'hi', sound_effect: 'door creak' }],
      }),
    );

    expect(parsed.approx_duration_minutes).toBe(7);
    expect(parsed.lines[0]).toEqual({ speaker: 'N', voice_id: '42', text: 'hi', sound_effect: 'door creak' });
  });

  it('reports invalid JSON', () => {
    const error = captureParseError('not json at all');
    expect(error.kind).toBe('json');
    expect(error.message).toBe('Failed to parse script response as JSON');
  });

  it('reports structural problems', () => {
    expect(captureParseError('[1, 2]').message).toBe('Invalid script structure: Script must be a JSON object');
    expect(captureParseError('{"story_title":"A","genre_tone":"B"}').reason).toBe('Missing required field: lines');
    expect(captureParseError('{"story_title":"A","genre_tone":"B","lines":[]}').reason).toBe(
      'Script must have at least one line',
    );
    expect(captureParseError('{"story_title":"A","genre_tone":"B","lines":[{"speaker":"N"}]}').kind).toBe(
      'structure',
    );
  });

  it('rejects lines whose text is not a scalar', () => {
    const error = captureParseError('{"story_title":"A","genre_tone":"B","lines":[{"speaker":"N","text":null}]}');
    expect(error.reason).toBe("Each line must have 'speaker' and 'text' fields");
  });

  it('estimates the duration when the reported one is not a number', () => {
    const parsed = parseScriptResponse(
      JSON.stringify({ story_title: 'A', genre_tone: 5, approx_duration_minutes: 'soon', lines: [{ speaker: 'N', text: 'x' }] }),
    );
    expect(parsed.approx_duration_minutes).toBe(1);
    expect(parsed.genre_tone).toBe('5');
  });
});

describe('script renderings', () => {
  it('renders markdown with sound effects', () => {
    expect(buildScriptText(script)).toBe(
      '# The Lighthouse\n\n*mystery*\n\n**Narrator**: Night falls.\n  🔊 [waves crashing]\n\n**Unknown**: Who is there?\n',
    );
  });

  it('returns an empty string without a script', () => {
    expect(buildScriptText(null)).toBe('');
  });

  it('renders plain speaker lines', () => {
    expect(buildPlainScriptText(script.lines)).toBe('Narrator: Night falls.\nUnknown: Who is there?');
  });

  it('extracts key events from lines with sound effects', () => {
    expect(extractKeyEvents(script)).toEqual(['Narrator: Night falls.']);
    expect(extractKeyEvents(undefined)).toEqual([]);
  });
});

describe('buildGenerationContext', () => {
  const project = { title: 'Saga', description: 'A coastal tale', genreTone: 'mystery' };
  const episode = { episodeNumber: 3, description: 'The storm', targetDurationMinutes: 10, includeSoundEffects: true };

  it('describes the project, episode and characters', () => {
    const context = buildGenerationContext(project, episode, [character]);

    expect(context).toContain('PROJECT TITLE: Saga');
    expect(context).toContain('EPISODE NUMBER: 3');
    expect(context).toContain('TARGET DURATION: 10 minutes');
    expect(context).toContain('"character_name": "Keeper"');
    expect(context).toContain('"voice_name": "Unknown"');
    expect(context).toContain(DEFAULT_PROMPTS.sound_effects_on);
    expect(context).not.toContain('=== PREVIOUS EPISODES CONTEXT ===');
  });

  it('adds earlier summaries and a truncated previous script', () => {
    const context = buildGenerationContext({ ...project }, { ...episode, includeSoundEffects: false }, [], [
      { episodeNumber: 1, title: 'First', summary: 'Summary one', scriptText: 'old script' },
      { episodeNumber: 2, title: 'Second', summary: 'Summary two', scriptText: 'x'.repeat(12000) },
    ]);

    expect(context).toContain(DEFAULT_PROMPTS.sound_effects_off);
    expect(context).toContain('Episode 1 (First):\nSummary one');
    expect(context).not.toContain('Summary two');
    expect(context).toContain('FULL SCRIPT OF PREVIOUS EPISODE (Second):');
    expect(context).toContain('x'.repeat(10000));
    expect(context).not.toContain('x'.repeat(10001));
  });
});
