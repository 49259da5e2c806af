import {
  nextVoteTransition,
  voteAfter,
  type VoteKind,
  type VoteRepository,
  type VoteTransition,
} from '../../domain/engagement/vote.js';
import type { TraceLogger } from '../../infra/logging/traceLogger.js';
import { DuplicateKeyError } from '../errors.js';

export interface SubmitVoteCommand {
  userId: string;
  postSlug: string;
  kind: VoteKind;
}

export interface SubmitVoteResult {
  transition: VoteTransition['type'];
  userVote: VoteKind | null;
}

export class SubmitVoteUseCase {
  constructor(private voteRepo: VoteRepository) {}

  /**
   * Apply the vote state machine for (userId, postSlug).
   *
   * Two concurrent first votes from the same user can both read "no vote" and
   * both insert; the loser hits the unique constraint. It re-reads and runs the
   * transition once more against the winner's row. A second violation propagates.
   */
  async execute(command: SubmitVoteCommand, logger: TraceLogger): Promise<SubmitVoteResult> {
    logger.operation('Vote Submission', {
      post_slug: command.postSlug,
      vote_type: command.kind,
      user_id: command.userId,
    });

    let result: SubmitVoteResult;
    try {
      result = await this.apply(command, logger);
    } catch (error) {
      if (!(error instanceof DuplicateKeyError)) {
        throw error;
      }
      logger.warn(
        `[Vote] Concurrent vote detected for post_slug=${command.postSlug}, user_id=${command.userId}; retrying`
      );
      result = await this.apply(command, logger);
    }

    logger.operation('Vote Submission Successful', { post_slug: command.postSlug });
    return result;
  }

  private async apply(command: SubmitVoteCommand, logger: TraceLogger): Promise<SubmitVoteResult> {
    logger.database('Query', 'votes', `post_slug=${command.postSlug}, user_id=${command.userId}`);
    const existing = await this.voteRepo.findByUserAndPost(command.userId, command.postSlug);
    const transition = nextVoteTransition(existing, command.kind);

    switch (transition.type) {
      case 'insert':
        logger.database('Insert', 'votes', `post_slug=${command.postSlug}, vote_type=${transition.kind}`);
        await this.voteRepo.insert(command.userId, command.postSlug, transition.kind);
        break;
      case 'delete':
        logger.database('Delete', 'votes', `id=${transition.voteId}`);
        await this.voteRepo.delete(transition.voteId);
        break;
      case 'update':
        logger.database('Update', 'votes', `id=${transition.voteId}, new_type=${transition.kind}`);
        await this.voteRepo.updateKind(transition.voteId, transition.kind);
        break;
    }

    return { transition: transition.type, userVote: voteAfter(transition) };
  }
}
