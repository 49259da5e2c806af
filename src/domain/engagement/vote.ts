import { InvalidVoteKindError } from './errors.js';

export const VOTE_KINDS = ['up', 'down'] as const;
export type VoteKind = (typeof VOTE_KINDS)[number];

export interface Vote {
  readonly id: string;
  readonly userId: string;
  readonly postSlug: string;
  readonly kind: VoteKind;
  readonly createdAt: Date;
  readonly updatedAt: Date;
}

export interface VoteCounts {
  upvotes: number;
  downvotes: number;
}

/**
 * Persistence port for votes.
 * `insert` throws DuplicateKeyError when the (userId, postSlug) pair already has a vote.
 */
export interface VoteRepository {
  findByUserAndPost(userId: string, postSlug: string): Promise<Vote | null>;
  insert(userId: string, postSlug: string, kind: VoteKind): Promise<Vote>;
  updateKind(id: string, kind: VoteKind): Promise<void>;
  delete(id: string): Promise<void>;
  countByPost(postSlug: string): Promise<VoteCounts>;
}

export function isVoteKind(value: string): value is VoteKind {
  return VOTE_KINDS.some((kind) => kind === value);
}

export function parseVoteKind(value: string): VoteKind {
  if (!isVoteKind(value)) {
    throw new InvalidVoteKindError(value);
  }
  return value;
}

/**
 * Write needed to move a (user, post) pair from its current vote to the submitted one.
 */
export type VoteTransition =
  | { type: 'insert'; kind: VoteKind }
  | { type: 'delete'; voteId: string }
  | { type: 'update'; voteId: string; kind: VoteKind };

/**
 * Vote state machine over {none, up, down}:
 * - none + kind          -> insert kind
 * - kind + same kind     -> delete (toggle off)
 * - kind + opposite kind -> update in place
 */
export function nextVoteTransition(existing: Vote | null, submitted: VoteKind): VoteTransition {
  if (!existing) {
    return { type: 'insert', kind: submitted };
  }
  if (existing.kind === submitted) {
    return { type: 'delete', voteId: existing.id };
  }
  return { type: 'update', voteId: existing.id, kind: submitted };
}

/**
 * The caller's vote after a transition has been applied.
 */
export function voteAfter(transition: VoteTransition): VoteKind | null {
  return transition.type === 'delete' ? null : transition.kind;
}
