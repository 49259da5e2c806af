import swaggerJsdoc from 'swagger-jsdoc';

const options: swaggerJsdoc.Options = {
  definition: {
    openapi: '3.0.0',
    info: {
      title: 'Blog Engagement API',
      version: '1.0.0',
      description: 'User authentication and blog engagement (votes, comments)',
    },
    servers: [
      {
        url: 'http://localhost:3000',
        description: 'Development server',
      },
    ],
    components: {
      securitySchemes: {
        bearerAuth: {
          type: 'http',
          scheme: 'bearer',
          bearerFormat: 'JWT',
        },
      },
      schemas: {
        ErrorResponse: {
          type: 'object',
          required: ['code', 'message'],
          properties: {
            code: {
              type: 'string',
              description: 'Error code identifier',
              example: 'NOT_FOUND',
            },
            message: {
              type: 'string',
              description: 'Human-readable error message',
              example: 'Comment not found',
            },
            details: {
              type: 'object',
              description: 'Additional error details (optional)',
              additionalProperties: true,
            },
          },
        },
        UserResponse: {
          type: 'object',
          required: ['id', 'username', 'email', 'created_at'],
          properties: {
            id: { type: 'string', format: 'uuid' },
            username: { type: 'string' },
            email: { type: 'string', format: 'email' },
            created_at: { type: 'string', format: 'date-time' },
          },
        },
        TokenResponse: {
          type: 'object',
          required: ['access_token', 'token_type', 'user'],
          properties: {
            access_token: { type: 'string' },
            token_type: { type: 'string', example: 'bearer' },
            user: { $ref: '#/components/schemas/UserResponse' },
          },
        },
        VoteSummary: {
          type: 'object',
          required: ['upvotes', 'downvotes', 'user_vote'],
          properties: {
            upvotes: { type: 'integer' },
            downvotes: { type: 'integer' },
            user_vote: { type: 'string', enum: ['up', 'down'], nullable: true },
          },
        },
        CommentResponse: {
          type: 'object',
          required: ['id', 'username', 'text', 'created_at', 'is_own'],
          properties: {
            id: { type: 'string', format: 'uuid' },
            username: { type: 'string' },
            text: { type: 'string' },
            created_at: { type: 'string', format: 'date-time' },
            is_own: { type: 'boolean' },
          },
        },
      },
    },
    tags: [
      { name: 'Auth', description: 'Registration, sign-in and the current user' },
      { name: 'Votes', description: 'Up/down votes on posts' },
      { name: 'Comments', description: 'Comments on posts' },
    ],
  },
  apis: ['./src/infra/http/routes/*.ts'],
};

/**
 * Build the OpenAPI document from the `@openapi` blocks in the route modules.
 */
export function buildOpenApiSpec(): object {
  return swaggerJsdoc(options);
}
