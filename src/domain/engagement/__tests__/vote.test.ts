import { describe, it, expect } from 'vitest';
import {
  isVoteKind,
  nextVoteTransition,
  parseVoteKind,
  voteAfter,
  type Vote,
} from '../vote.js';
import { InvalidVoteKindError } from '../errors.js';

describe('vote state machine', () => {
  const existing = (kind: Vote['kind']): Vote => ({
    id: 'vote-1',
    userId: 'user-1',
    postSlug: 'hello-world',
    kind,
    createdAt: new Date('2024-01-01T00:00:00Z'),
    updatedAt: new Date('2024-01-01T00:00:00Z'),
  });

  describe('nextVoteTransition', () => {
    it('should insert when there is no vote yet', () => {
      expect(nextVoteTransition(null, 'up')).toEqual({ type: 'insert', kind: 'up' });
      expect(nextVoteTransition(null, 'down')).toEqual({ type: 'insert', kind: 'down' });
    });

    it('should delete when the same kind is submitted again', () => {
      expect(nextVoteTransition(existing('up'), 'up')).toEqual({ type: 'delete', voteId: 'vote-1' });
      expect(nextVoteTransition(existing('down'), 'down')).toEqual({
        type: 'delete',
        voteId: 'vote-1',
      });
    });

    it('should update in place when the opposite kind is submitted', () => {
      expect(nextVoteTransition(existing('up'), 'down')).toEqual({
        type: 'update',
        voteId: 'vote-1',
        kind: 'down',
      });
      expect(nextVoteTransition(existing('down'), 'up')).toEqual({
        type: 'update',
        voteId: 'vote-1',
        kind: 'up',
      });
    });
  });

  describe('voteAfter', () => {
    it('should report the resulting vote of each transition', () => {
      expect(voteAfter({ type: 'insert', kind: 'up' })).toBe('up');
      expect(voteAfter({ type: 'update', voteId: 'v', kind: 'down' })).toBe('down');
      expect(voteAfter({ type: 'delete', voteId: 'v' })).toBeNull();
    });
  });

  describe('parseVoteKind', () => {
    it('should accept up and down', () => {
      expect(isVoteKind('up')).toBe(true);
      expect(parseVoteKind('down')).toBe('down');
    });

    it('should reject anything else', () => {
      expect(isVoteKind('UP')).toBe(false);
      expect(() => parseVoteKind('sideways')).toThrow(InvalidVoteKindError);
    });
  });
});
