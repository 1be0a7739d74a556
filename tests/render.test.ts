import { OptionRegistry } from '../src/core/options.js';
import {
  confirmationText, exportReply, exportText, optionsText, outOfRangeText, prerequisiteText, setupText, statusText,
} from '../src/core/render.js';
import { createScriptState } from '../src/core/state.js';
import type { Domain, ScriptPart, ScriptState } from '../src/core/types.js';
import { FIXED_NOW, candidates } from './helpers.js';

function part(content: string, domain: Domain): ScriptPart {
  return {
    content, label: content, description: null, domain, provider: null, model: null,
    instruction: null, iterations: 1, generated_at: FIXED_NOW.toISOString(),
  };
}

function drafted(): ScriptState {
  return {
    ...createScriptState('youtube', FIXED_NOW),
    phase: 'cta_drafted',
    hook: part('Did you know?', 'hook'),
    story: part('Act one.\nAct two.', 'story'),
    cta: part('Follow for more.', 'cta'),
  };
}

const pending = OptionRegistry.restore(null).present('hook', candidates('hook', 2), { mode: 'create', instruction: null });

describe('exportText', () => {
  it('assembles the script sections under the title', () => {
    expect(exportText(drafted())).toBe([
      'New Video Script Project',
      '',
      'HOOK:',
      'Did you know?',
      '',
      'STORY:',
      'Act one.',
      'Act two.',
      '',
      'CTA:',
      'Follow for more.',
    ].join('\n'));
  });

  it('returns null for an empty script', () => {
    const empty = createScriptState('youtube', FIXED_NOW);
    expect(exportText(empty)).toBeNull();
    expect(exportReply(empty)).toBe('There is nothing to export yet. Type `hook` to start your script.');
  });
});

describe('optionsText', () => {
  it('numbers options with their text and rationale', () => {
    expect(optionsText(pending, 'new')).toBe([
      'Here are 2 hook options:',
      '',
      '1. hook 1',
      '   hook text 1',
      '   ↳ why hook 1',
      '',
      '2. hook 2',
      '   hook text 2',
      '   ↳ why hook 2',
      '',
      'Reply with a number (1-2) to choose, `more` for different options, or describe what to change.',
    ].join('\n'));
  });

  it('re-lists the set when an index is out of range', () => {
    expect(outOfRangeText(pending).split('\n')[0]).toBe("That option doesn't exist. Choose a number between 1 and 2:");
  });
});

describe('transition replies', () => {
  it('confirms a merge and points at the next step', () => {
    const option = pending.options[0];
    if (!option) throw new Error('fixture has no options');
    expect(confirmationText('hook', option, 'story')).toBe('✅ Hook saved: "hook 1"\n\nNext step: type `story` to work on the story.');
    expect(confirmationText('style', option, 'export'))
      .toBe('✅ Style pass saved: "hook 1"\n\nYour script is complete. Type `export` to see it in full.');
  });

  it('explains a missing prerequisite', () => {
    expect(prerequisiteText('story', 'hook')).toBe('The story needs a hook first. Type `hook` to create one.');
    expect(prerequisiteText('cta', 'story')).toBe('The call to action needs a story first. Type `story` to create one.');
  });

  it('confirms brief changes', () => {
    expect(setupText('topic', 'coffee')).toBe('Topic set to "coffee".');
  });

  it('marks finished and pending parts in the status', () => {
    const lines = statusText({ ...drafted(), story: null }).split('\n');
    expect(lines).toContain('✅ Hook');
    expect(lines).toContain('⏳ Story');
    expect(lines).toContain('Phase: cta_drafted');
    expect(lines).toContain('Topic: (not set)');
  });
});
