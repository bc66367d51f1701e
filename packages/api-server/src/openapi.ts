/**
 * OpenAPI 3.0 description of the blog API.
 */
export interface OpenAPISpec {
  readonly openapi: string;
  readonly info: {
    readonly title: string;
    readonly version: string;
    readonly description: string;
  };
  readonly paths: Record<string, unknown>;
  readonly components: Record<string, unknown>;
}

const json = (schema: unknown): Record<string, unknown> => ({
  'application/json': { schema },
});

const ref = (name: string): { $ref: string } => ({ $ref: `#/components/schemas/${name}` });

const postIdParameter = {
  name: 'postId',
  in: 'path',
  required: true,
  schema: { type: 'integer', minimum: 1 },
};

const bearer = [{ bearerAuth: [] }];

export function createOpenAPISpec(version: string = '0.1.0'): OpenAPISpec {
  return {
    openapi: '3.0.3',
    info: {
      title: 'Blog API',
      version,
      description:
        'Multi-user blogging API. Users register, exchange credentials for a short-lived bearer token, ' +
        'and manage their own posts. Categories are shared; comments on any post are public to read.',
    },
    paths: {
      '/users': {
        post: {
          summary: 'Register a user',
          operationId: 'registerUser',
          tags: ['Auth'],
          requestBody: { required: true, content: json(ref('Credentials')) },
          responses: {
            '200': { description: 'Registered user', content: json(ref('User')) },
            '400': { $ref: '#/components/responses/BadRequest' },
            '422': { $ref: '#/components/responses/ValidationError' },
          },
        },
      },
      '/token': {
        post: {
          summary: 'Exchange credentials for a bearer token',
          description: 'Tokens expire after a fixed window (30 minutes by default). There is no refresh.',
          operationId: 'login',
          tags: ['Auth'],
          requestBody: {
            required: true,
            content: {
              'application/x-www-form-urlencoded': { schema: ref('Credentials') },
              'application/json': { schema: ref('Credentials') },
            },
          },
          responses: {
            '200': { description: 'Access token', content: json(ref('Token')) },
            '401': { $ref: '#/components/responses/Unauthorized' },
            '422': { $ref: '#/components/responses/ValidationError' },
          },
        },
      },
      '/categories': {
        post: {
          summary: 'Create a category',
          operationId: 'createCategory',
          tags: ['Categories'],
          security: bearer,
          requestBody: {
            required: true,
            content: json({ type: 'object', required: ['name'], properties: { name: { type: 'string', minLength: 1 } } }),
          },
          responses: {
            '200': { description: 'Created category', content: json(ref('Category')) },
            '400': { $ref: '#/components/responses/BadRequest' },
            '401': { $ref: '#/components/responses/Unauthorized' },
            '422': { $ref: '#/components/responses/ValidationError' },
          },
        },
        get: {
          summary: 'List all categories',
          operationId: 'listCategories',
          tags: ['Categories'],
          responses: {
            '200': { description: 'Categories', content: json({ type: 'array', items: ref('Category') }) },
          },
        },
      },
      '/posts': {
        post: {
          summary: 'Create a post',
          operationId: 'createPost',
          tags: ['Posts'],
          security: bearer,
          requestBody: { required: true, content: json(ref('PostInput')) },
          responses: {
            '200': { description: 'Created post', content: json(ref('Post')) },
            '401': { $ref: '#/components/responses/Unauthorized' },
            '404': { $ref: '#/components/responses/NotFound' },
            '422': { $ref: '#/components/responses/ValidationError' },
          },
        },
        get: {
          summary: "List the caller's posts",
          operationId: 'listPosts',
          tags: ['Posts'],
          security: bearer,
          parameters: [
            {
              name: 'category_id',
              in: 'query',
              required: false,
              description: '0 or absent lists every post',
              schema: { type: 'integer', minimum: 0 },
            },
          ],
          responses: {
            '200': { description: 'Posts', content: json({ type: 'array', items: ref('Post') }) },
            '401': { $ref: '#/components/responses/Unauthorized' },
            '422': { $ref: '#/components/responses/ValidationError' },
          },
        },
      },
      '/posts/{postId}': {
        parameters: [postIdParameter],
        get: {
          summary: 'Get one of your posts',
          description: "Another user's post is reported as not found.",
          operationId: 'getPost',
          tags: ['Posts'],
          security: bearer,
          responses: {
            '200': { description: 'Post', content: json(ref('Post')) },
            '401': { $ref: '#/components/responses/Unauthorized' },
            '404': { $ref: '#/components/responses/NotFound' },
          },
        },
        put: {
          summary: 'Replace one of your posts',
          operationId: 'updatePost',
          tags: ['Posts'],
          security: bearer,
          requestBody: { required: true, content: json(ref('PostInput')) },
          responses: {
            '200': { description: 'Updated post', content: json(ref('Post')) },
            '401': { $ref: '#/components/responses/Unauthorized' },
            '404': { $ref: '#/components/responses/NotFound' },
            '422': { $ref: '#/components/responses/ValidationError' },
          },
        },
        delete: {
          summary: 'Delete one of your posts',
          operationId: 'deletePost',
          tags: ['Posts'],
          security: bearer,
          responses: {
            '200': {
              description: 'Deleted',
              content: json({ type: 'object', properties: { message: { type: 'string' } } }),
            },
            '401': { $ref: '#/components/responses/Unauthorized' },
            '404': { $ref: '#/components/responses/NotFound' },
          },
        },
      },
      '/posts/{postId}/comments': {
        parameters: [postIdParameter],
        post: {
          summary: 'Comment on a post',
          operationId: 'createComment',
          tags: ['Comments'],
          security: bearer,
          requestBody: {
            required: true,
            content: json({ type: 'object', required: ['content'], properties: { content: { type: 'string', minLength: 1 } } }),
          },
          responses: {
            '200': { description: 'Created comment', content: json(ref('Comment')) },
            '401': { $ref: '#/components/responses/Unauthorized' },
            '404': { $ref: '#/components/responses/NotFound' },
            '422': { $ref: '#/components/responses/ValidationError' },
          },
        },
        get: {
          summary: 'List comments on a post',
          operationId: 'listComments',
          tags: ['Comments'],
          responses: {
            '200': { description: 'Comments', content: json({ type: 'array', items: ref('Comment') }) },
            '404': { $ref: '#/components/responses/NotFound' },
          },
        },
      },
      '/health': {
        get: {
          summary: 'Health check',
          operationId: 'health',
          tags: ['System'],
          responses: {
            '200': {
              description: 'Server is up',
              content: json({
                type: 'object',
                properties: { status: { type: 'string', enum: ['ok'] }, timestamp: { type: 'string', format: 'date-time' } },
              }),
            },
          },
        },
      },
    },
    components: {
      securitySchemes: {
        bearerAuth: {
          type: 'http',
          scheme: 'bearer',
          bearerFormat: 'JWT',
        },
      },
      schemas: {
        Credentials: {
          type: 'object',
          required: ['username', 'password'],
          properties: {
            username: { type: 'string', minLength: 1 },
            password: { type: 'string', minLength: 1 },
          },
        },
        User: {
          type: 'object',
          properties: { id: { type: 'integer' }, username: { type: 'string' } },
        },
        Token: {
          type: 'object',
          properties: {
            access_token: { type: 'string' },
            token_type: { type: 'string', enum: ['bearer'] },
          },
        },
        Category: {
          type: 'object',
          properties: { id: { type: 'integer' }, name: { type: 'string' } },
        },
        PostInput: {
          type: 'object',
          required: ['title', 'content'],
          properties: {
            title: { type: 'string', minLength: 1 },
            content: { type: 'string', minLength: 1 },
            category_id: { type: 'integer', minimum: 1, nullable: true },
          },
        },
        Post: {
          type: 'object',
          properties: {
            id: { type: 'integer' },
            title: { type: 'string' },
            content: { type: 'string' },
            created_at: { type: 'string', format: 'date-time' },
            author_id: { type: 'integer' },
            category_id: { type: 'integer', nullable: true },
          },
        },
        Comment: {
          type: 'object',
          properties: {
            id: { type: 'integer' },
            content: { type: 'string' },
            created_at: { type: 'string', format: 'date-time' },
            post_id: { type: 'integer' },
            author_id: { type: 'integer' },
          },
        },
        ErrorResponse: {
          type: 'object',
          properties: {
            error: { type: 'string' },
            message: { type: 'string' },
          },
        },
      },
      responses: {
        ValidationError: {
          description: 'Request validation error',
          content: json({
            type: 'object',
            properties: {
              error: { type: 'string' },
              details: { type: 'array', items: { type: 'object' } },
            },
          }),
        },
        BadRequest: {
          description: 'Name already taken',
          content: json(ref('ErrorResponse')),
        },
        Unauthorized: {
          description: 'Bad credentials, or a missing, expired or invalid token',
          headers: {
            'WWW-Authenticate': { schema: { type: 'string', enum: ['Bearer'] } },
          },
          content: json(ref('ErrorResponse')),
        },
        NotFound: {
          description: 'Resource does not exist or is not yours',
          content: json(ref('ErrorResponse')),
        },
      },
    },
  };
}
