import { describe, it, expect } from 'vitest';
import { COMMENT_MAX_LENGTH, validateCommentText } from '../comment.js';
import { InvalidCommentTextError } from '../errors.js';

describe('validateCommentText', () => {
  it('should accept text between 1 and 2000 characters', () => {
    expect(validateCommentText('x')).toBe('x');
    const longest = 'a'.repeat(COMMENT_MAX_LENGTH);
    expect(validateCommentText(longest)).toBe(longest);
  });

  it('should reject empty text', () => {
    expect(() => validateCommentText('')).toThrow(InvalidCommentTextError);
    expect(() => validateCommentText('')).toThrow('Comment text must not be empty');
  });

  it('should reject text over 2000 characters', () => {
    expect(() => validateCommentText('a'.repeat(2001))).toThrow(
      'Comment text must be at most 2000 characters'
    );
  });

  it('should count characters, not UTF-16 units, for emoji', () => {
    const grinning = '\u{1F600}';
    const atLimit = grinning.repeat(COMMENT_MAX_LENGTH);

    expect(validateCommentText(grinning.repeat(1500))).toHaveLength(3000);
    expect(validateCommentText(atLimit)).toBe(atLimit);
    expect(() => validateCommentText(grinning.repeat(COMMENT_MAX_LENGTH + 1))).toThrow(
      'Comment text must be at most 2000 characters'
    );
  });
});
