import { randomUUID } from 'crypto';
import { DuplicateKeyError } from '../application/errors.js';
import type { NewUser, User, UserRepository } from '../domain/auth/user.js';
import type {
  Comment,
  CommentRepository,
  CommentWithAuthor,
} from '../domain/engagement/comment.js';
import type { Vote, VoteCounts, VoteKind, VoteRepository } from '../domain/engagement/vote.js';
import {
  USERS_EMAIL_KEY,
  USERS_USERNAME_KEY,
  VOTES_USER_POST_KEY,
} from '../infra/db/pgSupport.js';

/**
 * Monotonic test clock: every call is one second after the previous one.
 */
export function steppingClock(start = new Date('2024-01-01T00:00:00.000Z')): () => Date {
  let tick = 0;
  return () => new Date(start.getTime() + tick++ * 1000);
}

/**
 * In-process stand-ins for the pg repositories. They enforce the same unique
 * constraints and raise the same DuplicateKeyError.
 */
export class InMemoryUserRepo implements UserRepository {
  readonly users = new Map<string, User>();

  constructor(private now: () => Date = steppingClock()) {}

  async findById(id: string): Promise<User | null> {
    return this.users.get(id) ?? null;
  }

  async findByEmail(email: string): Promise<User | null> {
    return [...this.users.values()].find((u) => u.email === email) ?? null;
  }

  async findByUsername(username: string): Promise<User | null> {
    return [...this.users.values()].find((u) => u.username === username) ?? null;
  }

  async create(user: NewUser): Promise<User> {
    if (await this.findByUsername(user.username)) {
      throw new DuplicateKeyError(USERS_USERNAME_KEY);
    }
    if (await this.findByEmail(user.email)) {
      throw new DuplicateKeyError(USERS_EMAIL_KEY);
    }
    const created: User = { id: randomUUID(), ...user, createdAt: this.now() };
    this.users.set(created.id, created);
    return created;
  }
}

export class InMemoryVoteRepo implements VoteRepository {
  readonly votes = new Map<string, Vote>();

  constructor(private now: () => Date = steppingClock()) {}

  async findByUserAndPost(userId: string, postSlug: string): Promise<Vote | null> {
    return this.find(userId, postSlug);
  }

  async insert(userId: string, postSlug: string, kind: VoteKind): Promise<Vote> {
    // The constraint always sees committed state, whatever the reads returned
    if (this.find(userId, postSlug)) {
      throw new DuplicateKeyError(VOTES_USER_POST_KEY);
    }
    const at = this.now();
    const vote: Vote = { id: randomUUID(), userId, postSlug, kind, createdAt: at, updatedAt: at };
    this.votes.set(vote.id, vote);
    return vote;
  }

  async updateKind(id: string, kind: VoteKind): Promise<void> {
    const vote = this.votes.get(id);
    if (vote) {
      this.votes.set(id, { ...vote, kind, updatedAt: this.now() });
    }
  }

  async delete(id: string): Promise<void> {
    this.votes.delete(id);
  }

  private find(userId: string, postSlug: string): Vote | null {
    return (
      [...this.votes.values()].find((v) => v.userId === userId && v.postSlug === postSlug) ?? null
    );
  }

  async countByPost(postSlug: string): Promise<VoteCounts> {
    const forPost = [...this.votes.values()].filter((v) => v.postSlug === postSlug);
    return {
      upvotes: forPost.filter((v) => v.kind === 'up').length,
      downvotes: forPost.filter((v) => v.kind === 'down').length,
    };
  }
}

export class InMemoryCommentRepo implements CommentRepository {
  readonly comments = new Map<string, Comment>();

  constructor(
    private users: InMemoryUserRepo,
    private now: () => Date = steppingClock()
  ) {}

  async listByPost(postSlug: string): Promise<CommentWithAuthor[]> {
    return [...this.comments.values()]
      .filter((c) => c.postSlug === postSlug)
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
      .map((c) => ({ ...c, authorUsername: this.users.users.get(c.userId)?.username ?? null }));
  }

  async findById(id: string): Promise<Comment | null> {
    return this.comments.get(id) ?? null;
  }

  async insert(userId: string, postSlug: string, text: string): Promise<Comment> {
    const comment: Comment = { id: randomUUID(), userId, postSlug, text, createdAt: this.now() };
    this.comments.set(comment.id, comment);
    return comment;
  }

  async delete(id: string): Promise<void> {
    this.comments.delete(id);
  }
}
