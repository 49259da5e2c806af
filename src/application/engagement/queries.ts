import type { CommentRepository } from '../../domain/engagement/comment.js';
import type { VoteKind, VoteRepository } from '../../domain/engagement/vote.js';

export interface VoteSummary {
  upvotes: number;
  downvotes: number;
  userVote: VoteKind | null;
}

export interface CommentView {
  id: string;
  username: string;
  text: string;
  createdAt: Date;
  isOwn: boolean;
}

const UNKNOWN_AUTHOR = 'Unknown';

/**
 * Read side for engagement. `callerId` is null for anonymous requests.
 */
export class EngagementQueries {
  constructor(
    private voteRepo: VoteRepository,
    private commentRepo: CommentRepository
  ) {}

  async getVoteSummary(postSlug: string, callerId: string | null): Promise<VoteSummary> {
    const counts = await this.voteRepo.countByPost(postSlug);

    let userVote: VoteKind | null = null;
    if (callerId) {
      const vote = await this.voteRepo.findByUserAndPost(callerId, postSlug);
      userVote = vote?.kind ?? null;
    }

    return {
      upvotes: counts.upvotes,
      downvotes: counts.downvotes,
      userVote,
    };
  }

  async listComments(postSlug: string, callerId: string | null): Promise<CommentView[]> {
    const comments = await this.commentRepo.listByPost(postSlug);

    return comments.map((comment) => ({
      id: comment.id,
      username: comment.authorUsername ?? UNKNOWN_AUTHOR,
      text: comment.text,
      createdAt: comment.createdAt,
      isOwn: callerId !== null && comment.userId === callerId,
    }));
  }
}
