import { type Comment, type CommentRepository, validateCommentText } from '../../domain/engagement/comment.js';
import type { TraceLogger } from '../../infra/logging/traceLogger.js';

export interface AddCommentCommand {
  userId: string;
  postSlug: string;
  text: string;
}

export class AddCommentUseCase {
  constructor(private commentRepo: CommentRepository) {}

  async execute(command: AddCommentCommand, logger: TraceLogger): Promise<Comment> {
    logger.operation('Comment Creation', { post_slug: command.postSlug, user_id: command.userId });

    const text = validateCommentText(command.text);

    logger.database('Insert', 'comments', `post_slug=${command.postSlug}`);
    const comment = await this.commentRepo.insert(command.userId, command.postSlug, text);

    logger.operation('Comment Creation Successful', {
      post_slug: command.postSlug,
      comment_id: comment.id,
    });
    return comment;
  }
}
