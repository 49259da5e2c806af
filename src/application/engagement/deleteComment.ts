import type { CommentRepository } from '../../domain/engagement/comment.js';
import type { TraceLogger } from '../../infra/logging/traceLogger.js';
import { ForbiddenError, NotFoundError } from '../errors.js';

export interface DeleteCommentCommand {
  commentId: string;
  userId: string;
}

export class DeleteCommentUseCase {
  constructor(private commentRepo: CommentRepository) {}

  /**
   * Only the author may delete. Existence is checked before ownership.
   */
  async execute(command: DeleteCommentCommand, logger: TraceLogger): Promise<void> {
    logger.operation('Comment Deletion', { comment_id: command.commentId, user_id: command.userId });

    logger.database('Query', 'comments', `id=${command.commentId}`);
    const comment = await this.commentRepo.findById(command.commentId);
    if (!comment) {
      logger.operation('Comment Deletion Failed', { reason: 'Comment not found' });
      throw new NotFoundError('Comment not found');
    }

    if (comment.userId !== command.userId) {
      logger.operation('Comment Deletion Failed', { reason: 'Unauthorized - not author' });
      throw new ForbiddenError('You can only delete your own comments');
    }

    logger.database('Delete', 'comments', `id=${command.commentId}`);
    await this.commentRepo.delete(command.commentId);

    logger.operation('Comment Deletion Successful', { comment_id: command.commentId });
  }
}
