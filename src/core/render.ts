/**
 * Reply text for every orchestrator branch. Pure string builders; the
 * orchestrator decides which one applies.
 */
import { DOMAIN_RULES, hasContent } from './state.js';
import {
  PLATFORMS,
  type BriefField, type Domain, type OptionItem, type PartField, type PendingOptions, type ScriptPart, type ScriptState,
} from './types.js';

const COMMANDS: Array<[string, string]> = [
  ['hook',            'Generate opening hooks'],
  ['story',           'Build the story around your hook'],
  ['cta',             'Write the call to action'],
  ['review',          'Get review notes on the full script'],
  ['humanize',        'Make the script sound natural'],
  ['style',           'Final style pass'],
  ['critique',        'Challenge the script'],
  ['research',        'Gather facts to build on'],
  ['edit <part>',     'Rework an existing part (hook, story, cta, ...)'],
  ['topic <text>',    'Set the video topic'],
  ['platform <name>', `Set the platform (${PLATFORMS.join(', ')})`],
  ['audience <text>', 'Describe who is watching'],
  ['duration <text>', 'Set the target length'],
  ['tone <text>',     'Add a sample of your writing so the script sounds like you'],
  ['status',          'Show progress'],
  ['export',          'Show the assembled script'],
  ['help',            'Show this list'],
];

function commandList(): string {
  return COMMANDS.map(([cmd, what]) => `• \`${cmd}\` → ${what}`).join('\n');
}

function stepLabel(step: Domain | 'export'): string {
  return step === 'export' ? 'export' : DOMAIN_RULES[step].title.toLowerCase();
}

// ─── Entry and read-only replies ──────────────────────────────────────────────

export function welcomeText(state: ScriptState): string {
  const about = state.topic ? ` for "${state.topic}"` : '';
  return [
    `Welcome! Let's create an engaging ${state.platform} video script${about}.`,
    '',
    'Commands:',
    commandList(),
    '',
    'Start with `hook` to create your opening, then `story`, then `cta`.',
  ].join('\n');
}

export function helpText(): string {
  return ['Available commands:', commandList(), '', 'When options are listed, reply with their number to choose one.'].join('\n');
}

export function statusText(state: ScriptState): string {
  const mark = (part: ScriptPart | null): string => (hasContent(part) ? '✅' : '⏳');
  const lines = [
    `📊 ${state.title}`,
    `Platform: ${state.platform}`,
    `Topic: ${state.topic ?? '(not set)'}`,
    `Audience: ${state.audience ?? '(not set)'}`,
    `Duration: ${state.duration ?? '(not set)'}`,
    `Phase: ${state.phase}`,
    '',
    `${mark(state.hook)} Hook`,
    `${mark(state.story)} Story`,
    `${mark(state.cta)} Call to action`,
    `${mark(state.review_notes)} Review notes`,
    `${mark(state.style_notes)} Styled script`,
  ];
  if (hasContent(state.research_notes)) lines.push('✅ Research notes');
  return lines.join('\n');
}

const EXPORT_SECTIONS: Array<[PartField, string]> = [
  ['hook',           'HOOK'],
  ['story',          'STORY'],
  ['cta',            'CTA'],
  ['style_notes',    'STYLED SCRIPT'],
  ['review_notes',   'REVIEW NOTES'],
  ['research_notes', 'RESEARCH NOTES'],
];

/** Plain-text script, or null when no part has content. */
export function exportText(state: ScriptState): string | null {
  const sections = EXPORT_SECTIONS.flatMap(([field, heading]) => {
    const part = state[field];
    return hasContent(part) ? [`${heading}:\n${part.content}`] : [];
  });
  if (sections.length === 0) return null;
  return [state.title, '', sections.join('\n\n')].join('\n');
}

export function exportReply(state: ScriptState): string {
  return exportText(state) ?? 'There is nothing to export yet. Type `hook` to start your script.';
}

// ─── Options ──────────────────────────────────────────────────────────────────

export function formatOptions(options: readonly OptionItem[]): string {
  return options.map((o, i) => {
    const lines = [`${i + 1}. ${o.label}`];
    if (o.value !== o.label) lines.push(...o.value.split('\n').map((l) => `   ${l}`));
    if (o.description) lines.push(`   ↳ ${o.description}`);
    return lines.join('\n');
  }).join('\n\n');
}

export type OptionsHeading = 'new' | 'more' | 'refined' | 'edit';

export function optionsText(pending: PendingOptions, heading: OptionsHeading): string {
  const what = DOMAIN_RULES[pending.origin_step].title.toLowerCase();
  const n = pending.options.length;
  const intro: Record<OptionsHeading, string> = {
    new:     `Here are ${n} ${what} options:`,
    more:    `Here are ${n} more ${what} options:`,
    refined: `Here are ${n} refined ${what} options:`,
    edit:    `Here are ${n} reworked ${what} options:`,
  };
  return [
    intro[heading],
    '',
    formatOptions(pending.options),
    '',
    `Reply with a number (1-${n}) to choose, \`more\` for different options, or describe what to change.`,
  ].join('\n');
}

// ─── Transitions ──────────────────────────────────────────────────────────────

export function confirmationText(domain: Domain, option: OptionItem, next: Domain | 'export'): string {
  const title = DOMAIN_RULES[domain].title;
  const suggestion = next === 'export'
    ? 'Your script is complete. Type `export` to see it in full.'
    : `Next step: type \`${next}\` to work on the ${stepLabel(next)}.`;
  return `✅ ${title} saved: "${option.label}"\n\n${suggestion}`;
}

export function prerequisiteText(domain: Domain, missing: Domain): string {
  return `The ${stepLabel(domain)} needs a ${stepLabel(missing)} first. Type \`${missing}\` to create one.`;
}

export function unknownEditTargetText(raw: string): string {
  const parts = Object.keys(DOMAIN_RULES).map((d) => `\`${d}\``).join(', ');
  return raw
    ? `I can't edit "${raw}". Use \`edit <part>\` with one of: ${parts}.`
    : `Tell me what to edit, for example \`edit hook make it shorter\`. Parts: ${parts}.`;
}

export function nothingToEditText(target: Domain): string {
  return `There is no ${stepLabel(target)} to edit yet. Type \`${target}\` to create one.`;
}

export function noteText(focus: Domain, count: number): string {
  const plural = count === 1 ? 'note' : 'notes';
  return `Noted. I'll use your ${count} ${plural} the next time you type \`${focus}\`.`;
}

export function setupText(field: BriefField, value: string): string {
  return `${field[0]?.toUpperCase() ?? ''}${field.slice(1)} set to "${value}".`;
}

export function toneSampleText(count: number, max: number): string {
  const next = count < max
    ? 'Add another with `tone <text>` or carry on with the script.'
    : `That is ${max}, the most I keep. A new sample replaces the oldest one.`;
  return `Writing sample saved (${count} of ${max}). \`humanize\` and \`style\` will match your voice.\n${next}`;
}

export function invalidPlatformText(value: string): string {
  return `"${value}" is not a supported platform. Choose one of: ${PLATFORMS.join(', ')}.`;
}

// ─── Recovered errors ─────────────────────────────────────────────────────────

export function noPendingText(): string {
  return 'There are no options to choose from right now. Type a command such as `hook` to generate some.';
}

export function outOfRangeText(pending: PendingOptions): string {
  return [
    `That option doesn't exist. Choose a number between 1 and ${pending.options.length}:`,
    '',
    formatOptions(pending.options),
  ].join('\n');
}

export function emptyGenerationText(domain: Domain): string {
  return `I couldn't come up with usable ${stepLabel(domain)} options that time. Type \`${domain}\` to try again.`;
}
