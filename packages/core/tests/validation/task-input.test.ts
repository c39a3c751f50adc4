import { describe, it, expect } from 'vitest';
import {
  TITLE_MAX_LENGTH,
  DESCRIPTION_MAX_LENGTH,
  characterLength,
  createTaskInputSchema,
  replaceTaskInputSchema,
  setCompletionInputSchema,
  taskIdSchema,
} from '../../src/validation/task-input.js';

describe('createTaskInputSchema', () => {
  it('fills defaults for optional fields', () => {
    expect(createTaskInputSchema.parse({ title: 'Buy milk' })).toEqual({
      title: 'Buy milk',
      description: null,
      completed: false,
    });
  });

  it('drops unknown fields', () => {
    expect(createTaskInputSchema.parse({ title: 'x', id: 5, owner: 'someone' })).toEqual({
      title: 'x',
      description: null,
      completed: false,
    });
  });

  it('reports the offending field path', () => {
    const result = createTaskInputSchema.safeParse({ title: 'ok', completed: 'yes' });
    expect(result.success).toBe(false);
    expect(result.error?.issues.map(i => i.path)).toEqual([['completed']]);
  });

  it('requires a title', () => {
    const result = createTaskInputSchema.safeParse({ description: 'no title' });
    expect(result.error?.issues[0]?.path).toEqual(['title']);
  });
});

describe('length bounds', () => {
  // Each of these is one code point but two UTF-16 units
  const emoji = '\u{1F95B}';

  it('counts code points rather than UTF-16 units', () => {
    expect(emoji.length).toBe(2);
    expect(characterLength(emoji.repeat(3))).toBe(3);
  });

  it('accepts a title of 200 astral characters', () => {
    const title = emoji.repeat(TITLE_MAX_LENGTH);
    expect(createTaskInputSchema.parse({ title }).title).toBe(title);
  });

  it('rejects a title of 201 astral characters', () => {
    const result = createTaskInputSchema.safeParse({ title: emoji.repeat(TITLE_MAX_LENGTH + 1) });
    expect(result.error?.issues.map(i => [i.path, i.code])).toEqual([[['title'], 'too_big']]);
  });

  it('rejects an empty title as too small', () => {
    const result = createTaskInputSchema.safeParse({ title: '' });
    expect(result.error?.issues.map(i => [i.path, i.code])).toEqual([[['title'], 'too_small']]);
  });

  it('accepts a 2000-character description mixing BMP and astral characters', () => {
    const description = `\u00e9${emoji}`.repeat(DESCRIPTION_MAX_LENGTH / 2);
    expect(replaceTaskInputSchema.parse({ title: 'x', description, completed: false }).description).toBe(description);
  });

  it('rejects a 2001-character description', () => {
    const description = `\u00e9${emoji}`.repeat(DESCRIPTION_MAX_LENGTH / 2) + 'x';
    const result = replaceTaskInputSchema.safeParse({ title: 'x', description, completed: false });
    expect(result.error?.issues.map(i => i.path)).toEqual([['description']]);
  });
});

describe('replaceTaskInputSchema', () => {
  it('requires completed', () => {
    const result = replaceTaskInputSchema.safeParse({ title: 'x' });
    expect(result.error?.issues.map(i => i.path)).toEqual([['completed']]);
  });

  it('accepts a null description', () => {
    expect(replaceTaskInputSchema.parse({ title: 'x', description: null, completed: true })).toEqual({
      title: 'x',
      description: null,
      completed: true,
    });
  });
});

describe('setCompletionInputSchema', () => {
  it('ignores a description field of any length', () => {
    expect(setCompletionInputSchema.parse({ completed: true, description: 'd'.repeat(5000) })).toEqual({
      completed: true,
    });
  });

  it('rejects a non-boolean', () => {
    expect(setCompletionInputSchema.safeParse({ completed: 1 }).success).toBe(false);
  });
});

describe('taskIdSchema', () => {
  it('coerces numeric path segments', () => {
    expect(taskIdSchema.parse('12')).toBe(12);
  });

  it.each(['0', '-3', '1.5', 'abc', '0x1', '1e0', ' 1', '+1', ''])('rejects "%s"', (raw) => {
    expect(taskIdSchema.safeParse(raw).success).toBe(false);
  });
});
