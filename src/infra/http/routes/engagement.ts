import { Router } from 'express';
import { z } from 'zod';
import { SubmitVoteUseCase } from '../../../application/engagement/submitVote.js';
import { AddCommentUseCase } from '../../../application/engagement/addComment.js';
import { DeleteCommentUseCase } from '../../../application/engagement/deleteComment.js';
import {
  EngagementQueries,
  type CommentView,
  type VoteSummary,
} from '../../../application/engagement/queries.js';
import type { CommentRepository } from '../../../domain/engagement/comment.js';
import { VOTE_KINDS, type VoteRepository } from '../../../domain/engagement/vote.js';
import type { TraceLogger } from '../../logging/traceLogger.js';
import { requireAuth, requireUser, type AuthRequest } from '../middleware/auth.js';
import { requestLogger } from '../middleware/requestId.js';
import { validate } from '../middleware/validate.js';
import { asyncHandler } from '../middleware/asyncHandler.js';

/**
 * @openapi
 * /posts/{slug}/votes:
 *   get:
 *     tags: [Votes]
 *     summary: Vote counts for a post, plus the caller's own vote when authenticated
 *     security: [{}, { bearerAuth: [] }]
 *     parameters:
 *       - in: path
 *         name: slug
 *         required: true
 *         schema: { type: string }
 *     responses:
 *       200:
 *         description: OK
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/VoteSummary' }
 *   post:
 *     tags: [Votes]
 *     summary: Vote on a post. Repeating the same vote removes it; the opposite vote replaces it.
 *     security: [{ bearerAuth: [] }]
 *     parameters:
 *       - in: path
 *         name: slug
 *         required: true
 *         schema: { type: string }
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [vote_type]
 *             properties:
 *               vote_type: { type: string, enum: [up, down] }
 *     responses:
 *       200:
 *         description: Updated counts
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/VoteSummary' }
 *       400:
 *         description: Invalid vote_type
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       401:
 *         description: Not authenticated
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /posts/{slug}/comments:
 *   get:
 *     tags: [Comments]
 *     summary: Comments on a post, newest first
 *     security: [{}, { bearerAuth: [] }]
 *     parameters:
 *       - in: path
 *         name: slug
 *         required: true
 *         schema: { type: string }
 *     responses:
 *       200:
 *         description: OK
 *         content:
 *           application/json:
 *             schema:
 *               type: array
 *               items: { $ref: '#/components/schemas/CommentResponse' }
 *   post:
 *     tags: [Comments]
 *     summary: Add a comment to a post
 *     security: [{ bearerAuth: [] }]
 *     parameters:
 *       - in: path
 *         name: slug
 *         required: true
 *         schema: { type: string }
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [text]
 *             properties:
 *               text: { type: string, minLength: 1, maxLength: 2000 }
 *     responses:
 *       200:
 *         description: Created comment
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/CommentResponse' }
 *       400:
 *         description: Text empty or too long
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       401:
 *         description: Not authenticated
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *
 * /posts/{slug}/comments/{commentId}:
 *   delete:
 *     tags: [Comments]
 *     summary: Delete one of your own comments
 *     security: [{ bearerAuth: [] }]
 *     parameters:
 *       - in: path
 *         name: slug
 *         required: true
 *         schema: { type: string }
 *       - in: path
 *         name: commentId
 *         required: true
 *         schema: { type: string }
 *     responses:
 *       200:
 *         description: Deleted
 *       401:
 *         description: Not authenticated
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       403:
 *         description: Comment belongs to another user
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 *       404:
 *         description: Comment not found
 *         content:
 *           application/json:
 *             schema: { $ref: '#/components/schemas/ErrorResponse' }
 */

const submitVoteBodySchema = z.object({
  vote_type: z.enum(VOTE_KINDS, {
    errorMap: () => ({ message: "Vote type must be 'up' or 'down'" }),
  }),
});

const addCommentBodySchema = z.object({
  // Length is checked by the domain so it answers with INVALID_COMMENT
  text: z.string(),
});

export interface VoteSummaryResponse {
  upvotes: number;
  downvotes: number;
  user_vote: string | null;
}

export interface CommentResponse {
  id: string;
  username: string;
  text: string;
  created_at: string;
  is_own: boolean;
}

function toVoteSummaryResponse(summary: VoteSummary): VoteSummaryResponse {
  return {
    upvotes: summary.upvotes,
    downvotes: summary.downvotes,
    user_vote: summary.userVote,
  };
}

function toCommentResponse(comment: CommentView): CommentResponse {
  return {
    id: comment.id,
    username: comment.username,
    text: comment.text,
    created_at: comment.createdAt.toISOString(),
    is_own: comment.isOwn,
  };
}

export interface EngagementRoutesDeps {
  votes: VoteRepository;
  comments: CommentRepository;
  logger: TraceLogger;
}

export function createEngagementRoutes({ votes, comments, logger }: EngagementRoutesDeps) {
  const router = Router();
  const submitVoteUseCase = new SubmitVoteUseCase(votes);
  const addCommentUseCase = new AddCommentUseCase(comments);
  const deleteCommentUseCase = new DeleteCommentUseCase(comments);
  const queries = new EngagementQueries(votes, comments);

  // Votes
  router.get(
    '/:slug/votes',
    asyncHandler(async (req: AuthRequest, res) => {
      const summary = await queries.getVoteSummary(req.params.slug, req.user?.id ?? null);
      res.json(toVoteSummaryResponse(summary));
    })
  );

  router.post(
    '/:slug/votes',
    requireAuth,
    validate({ body: submitVoteBodySchema }),
    asyncHandler(async (req: AuthRequest, res) => {
      const user = requireUser(req);
      const body = submitVoteBodySchema.parse(req.body);

      await submitVoteUseCase.execute(
        { userId: user.id, postSlug: req.params.slug, kind: body.vote_type },
        requestLogger(req, logger)
      );

      const summary = await queries.getVoteSummary(req.params.slug, user.id);
      res.json(toVoteSummaryResponse(summary));
    })
  );

  // Comments
  router.get(
    '/:slug/comments',
    asyncHandler(async (req: AuthRequest, res) => {
      const list = await queries.listComments(req.params.slug, req.user?.id ?? null);
      res.json(list.map(toCommentResponse));
    })
  );

  router.post(
    '/:slug/comments',
    requireAuth,
    validate({ body: addCommentBodySchema }),
    asyncHandler(async (req: AuthRequest, res) => {
      const user = requireUser(req);
      const body = addCommentBodySchema.parse(req.body);

      const comment = await addCommentUseCase.execute(
        { userId: user.id, postSlug: req.params.slug, text: body.text },
        requestLogger(req, logger)
      );

      res.json(
        toCommentResponse({
          id: comment.id,
          username: user.username,
          text: comment.text,
          createdAt: comment.createdAt,
          isOwn: true,
        })
      );
    })
  );

  router.delete(
    '/:slug/comments/:commentId',
    requireAuth,
    asyncHandler(async (req: AuthRequest, res) => {
      const user = requireUser(req);

      await deleteCommentUseCase.execute(
        { commentId: req.params.commentId, userId: user.id },
        requestLogger(req, logger)
      );

      res.json({ message: 'Comment deleted' });
    })
  );

  return router;
}
