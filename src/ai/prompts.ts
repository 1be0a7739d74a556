/**
 * Prompt assembly for each generation domain.
 */
import type { Domain, GenerationContext, PartField } from '../core/types.js';

export interface Prompt {
  system: string;
  user: string;
}

const ROLES: Record<Domain, { persona: string; task: string }> = {
  hook: {
    persona: 'a short-form video attention expert',
    task: 'Write opening hooks (3-8 seconds spoken) that stop the scroll. Each option uses a different framework: curiosity gap, problem/agitation, statistical shock, personal story or bold claim.',
  },
  story: {
    persona: 'a screenwriter who structures short videos',
    task: 'Write the body of the video as a three-act narrative that pays off the chosen hook. Mark the acts and keep the pacing within the target duration.',
  },
  cta: {
    persona: 'a direct-response conversion specialist',
    task: 'Write closing calls to action that follow naturally from the story and fit the platform conventions.',
  },
  review: {
    persona: 'a script editor',
    task: 'Review the full script. Each option is a distinct set of review notes: strengths, weaknesses and concrete fixes, ordered by impact.',
  },
  humanize: {
    persona: 'a voice and tone editor',
    task: 'Rewrite the full script so it sounds like a real person talking: contractions, varied sentence length, no corporate filler. Each option is a complete rewritten script.',
  },
  style: {
    persona: 'a brand voice stylist',
    task: 'Produce a final style pass of the full script for the platform. Each option is a complete script in a distinct voice (e.g. energetic, calm expert, witty).',
  },
  critique: {
    persona: 'a constructive critic who pushes back on weak ideas',
    task: 'Challenge the script. Each option is a pointed critique with probing questions and one alternative direction.',
  },
  research: {
    persona: 'a careful research analyst and fact-checker',
    task: 'Gather facts, numbers and examples the script can rely on. Each option is a research brief with claims the creator should verify before publishing.',
  },
};

const PART_TITLES: Array<[PartField, string]> = [
  ['research_notes', 'Research notes'],
  ['hook',           'Hook'],
  ['story',          'Story'],
  ['cta',            'Call to action'],
  ['review_notes',   'Review notes'],
  ['style_notes',    'Styled script'],
];

function briefLines(ctx: GenerationContext): string[] {
  return [
    `Platform: ${ctx.platform}`,
    ctx.topic ? `Topic: ${ctx.topic}` : null,
    ctx.audience ? `Audience: ${ctx.audience}` : null,
    ctx.duration ? `Target duration: ${ctx.duration}` : null,
  ].filter((l): l is string => l !== null);
}

export function buildPrompt(ctx: GenerationContext): Prompt {
  const role = ROLES[ctx.domain];
  const system =
    `You are ${role.persona}. You help a creator build a video script one part at a time.\n` +
    'Reply with a JSON array only, no prose. Each element is an object with "label" ' +
    '(a short title), "value" (the full text of the option) and "description" (one sentence on why it works).';

  const sections: string[] = [role.task, '', ...briefLines(ctx)];

  const parts = PART_TITLES.flatMap(([field, title]) => {
    const text = ctx.script[field];
    return text ? [`## ${title}`, text] : [];
  });
  if (parts.length > 0) sections.push('', 'Script so far:', ...parts);

  if (ctx.mode === 'edit' && ctx.current) {
    sections.push('', 'Rework this existing version instead of starting over:', ctx.current);
  }
  if (ctx.tone_samples.length > 0) {
    sections.push(
      '',
      'Match the voice of these samples of the creator\'s own writing (word choice, rhythm, humour):',
      ...ctx.tone_samples.map((sample, i) => `Sample ${i + 1}: ${sample}`),
    );
  }
  if (ctx.instruction) {
    sections.push('', `Creator instructions: ${ctx.instruction}`);
  }
  if (ctx.exclude.length > 0) {
    sections.push('', 'Produce alternatives. Do not repeat or lightly reword any of these:', ...ctx.exclude.map((v) => `- ${v}`));
  }

  sections.push('', `Return exactly ${ctx.count} options.`);
  return { system, user: sections.join('\n') };
}
