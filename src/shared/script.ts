/**
 * Script helpers: the LLM generation context, parsing of the model's JSON reply
 * and the readable renderings stored next to the script.
 */
import { z } from 'zod';
import { AUDIO_SETTINGS, DEFAULT_PROMPTS } from '@/config/providers.js';
import type { Episode } from '@/db/schema/episodes.js';
import type { Project, ProjectCharacter } from '@/db/schema/projects.js';
import type { Voice } from '@/db/schema/voices.js';
import type { Script, ScriptLine } from '@/types/pipeline.js';

export type CharacterWithVoice = ProjectCharacter & { voice: Voice | null };

export type ContextProject = Pick<Project, 'title' | 'description' | 'genreTone'>;

export type ContextEpisode = Pick<
  Episode,
  'episodeNumber' | 'description' | 'targetDurationMinutes' | 'includeSoundEffects'
>;

export type PreviousEpisode = Pick<Episode, 'episodeNumber' | 'title' | 'summary' | 'scriptText'>;

const PREVIOUS_SCRIPT_LIMIT = 10000;

export function buildGenerationContext(
  project: ContextProject,
  episode: ContextEpisode,
  characters: CharacterWithVoice[],
  previousEpisodes: PreviousEpisode[] = [],
): string {
  const charactersInfo = characters.map((character) => ({
    role: character.role,
    character_name: character.characterName,
    voice_id: character.voiceId,
    voice_name: character.voice?.elevenlabsName ?? 'Unknown',
  }));

  const parts = [
    `PROJECT TITLE: ${project.title}`,
    `PROJECT DESCRIPTION: ${project.description}`,
    `GENRE/TONE: ${project.genreTone}`,
    '',
    `EPISODE NUMBER: ${episode.episodeNumber}`,
    `EPISODE DESCRIPTION: ${episode.description}`,
    `TARGET DURATION: ${episode.targetDurationMinutes} minutes`,
    '',
    'CHARACTERS:',
    JSON.stringify(charactersInfo, null, 2),
    '',
    episode.includeSoundEffects ? DEFAULT_PROMPTS.sound_effects_on : DEFAULT_PROMPTS.sound_effects_off,
  ];

  const lastEpisode = previousEpisodes[previousEpisodes.length - 1];
  if (lastEpisode) {
    parts.push('', '=== PREVIOUS EPISODES CONTEXT ===');

    if (previousEpisodes.length > 1) {
      parts.push('\nSUMMARIES OF EARLIER EPISODES:');
      for (const previous of previousEpisodes.slice(0, -1)) {
        if (previous.summary) {
          parts.push(`\nEpisode ${previous.episodeNumber} (${previous.title}):`, previous.summary);
        }
      }
    }

    if (lastEpisode.scriptText) {
      parts.push(
        `\nFULL SCRIPT OF PREVIOUS EPISODE (${lastEpisode.title}):`,
        lastEpisode.scriptText.slice(0, PREVIOUS_SCRIPT_LIMIT),
      );
    }
  }

  parts.push(
    '',
    '=== GENERATE THE SCRIPT ===',
    'Create an engaging script that continues the story naturally. Return ONLY valid JSON.',
  );

  return parts.join('\n');
}

/** Thrown by parseScriptResponse; callers wrap it into a provider error. */
export class ScriptParseError extends Error {
  constructor(
    message: string,
    public readonly kind: 'json' | 'structure',
    public readonly reason: string,
  ) {
    super(message);
    this.name = 'ScriptParseError';
  }
}

function stripCodeFence(response: string): string {
  const jsonFence = response.indexOf('```json');
  if (jsonFence !== -1) {
    const start = jsonFence + 7;
    const end = response.indexOf('```', start);
    return response.slice(start, end === -1 ? undefined : end).trim();
  }
  const fence = response.indexOf('```');
  if (fence !== -1) {
    const start = fence + 3;
    const end = response.indexOf('```', start);
    return response.slice(start, end === -1 ? undefined : end).trim();
  }
  return response;
}

function structureError(reason: string): ScriptParseError {
  return new ScriptParseError(`Invalid script structure: ${reason}`, 'structure', reason);
}

// Models return numbers or booleans for text fields now and then; anything else is rejected
const textField = z.union([z.string(), z.number(), z.boolean()]).transform(String);

const scriptLineSchema = z.object({
  speaker: textField,
  text: textField,
  voice_id: z
    .union([z.string(), z.number()])
    .nullish()
    .transform((value) => (value == null ? '' : String(value))),
  sound_effect: z.unknown().transform((value) => (typeof value === 'string' && value ? value : null)),
});

const scriptResponseSchema = z.object({
  story_title: textField,
  genre_tone: textField,
  approx_duration_minutes: z.number().optional().catch(undefined),
  lines: z.array(scriptLineSchema).min(1),
});

function describeIssue(issue: z.ZodIssue): string {
  const [field] = issue.path;
  if (field === undefined) {
    return 'Script must be a JSON object';
  }
  if (issue.code === z.ZodIssueCode.invalid_type && issue.received === 'undefined' && issue.path.length === 1) {
    return `Missing required field: ${field}`;
  }
  if (field === 'lines') {
    return issue.path.length === 1
      ? 'Script must have at least one line'
      : "Each line must have 'speaker' and 'text' fields";
  }
  return `Invalid ${issue.path.join('.')}: ${issue.message}`;
}

/**
 * Parse the model's reply into a Script, filling voice_id, sound_effect
 * and approx_duration_minutes when the model left them out.
 */
export function parseScriptResponse(response: string): Script {
  const body = stripCodeFence(response);

  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch (error) {
    throw new ScriptParseError(
      'Failed to parse script response as JSON',
      'json',
      error instanceof Error ? error.message : String(error),
    );
  }

  const result = scriptResponseSchema.safeParse(parsed);
  if (!result.success) {
    const [issue] = result.error.issues;
    throw structureError(issue ? describeIssue(issue) : 'Unrecognised script');
  }

  const { lines, approx_duration_minutes: duration, story_title, genre_tone } = result.data;
  const totalChars = lines.reduce((sum, line) => sum + line.text.length, 0);

  return {
    story_title,
    genre_tone,
    approx_duration_minutes: duration ?? Math.max(1, Math.floor(totalChars / AUDIO_SETTINGS.charsPerMinute)),
    lines,
  };
}

/**
 * Markdown rendering used for previews and exports
 */
export function buildScriptText(script: Script | null | undefined): string {
  if (!script) {
    return '';
  }

  const out: string[] = [];
  if (script.story_title) {
    out.push(`# ${script.story_title}`, '');
  }
  if (script.genre_tone) {
    out.push(`*${script.genre_tone}*`, '');
  }
  for (const line of script.lines) {
    out.push(`**${line.speaker || 'Unknown'}**: ${line.text}`);
    if (line.sound_effect) {
      out.push(`  🔊 [${line.sound_effect}]`);
    }
    out.push('');
  }
  return out.join('\n');
}

/** Plain `speaker: text` rendering stored as the episode's script_text. */
export function buildPlainScriptText(lines: Array<Partial<ScriptLine>>): string {
  return lines.map((line) => `${line.speaker || 'Unknown'}: ${line.text ?? ''}`).join('\n');
}

export function extractKeyEvents(script: Script | null | undefined, maxEvents = 5): string[] {
  if (!script) {
    return [];
  }
  return script.lines
    .filter((line) => Boolean(line.sound_effect))
    .slice(0, maxEvents)
    .map((line) => `${line.speaker || 'Unknown'}: ${line.text.slice(0, 100)}`);
}
