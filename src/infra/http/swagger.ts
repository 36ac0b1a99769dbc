import swaggerJsdoc from 'swagger-jsdoc';

const options: swaggerJsdoc.Options = {
  definition: {
    openapi: '3.0.0',
    info: {
      title: 'User Directory API',
      version: '1.0.0',
      description: 'CRUD, name search and password check over a single users table',
    },
    servers: [
      {
        url: 'http://localhost:3000',
        description: 'Development server',
      },
    ],
    components: {
      schemas: {
        UserProfile: {
          type: 'object',
          required: ['id', 'name', 'email'],
          properties: {
            id: { type: 'integer', example: 1 },
            name: { type: 'string', example: 'Alice' },
            email: { type: 'string', format: 'email', example: 'alice@example.com' },
          },
        },
        ErrorResponse: {
          type: 'object',
          required: ['error', 'message'],
          properties: {
            error: {
              type: 'string',
              description: 'Error category',
              example: 'Invalid Email',
            },
            message: {
              type: 'string',
              description: 'Human-readable error message',
              example: 'Please provide a valid email address.',
            },
            details: {
              type: 'object',
              description: 'Additional error details (optional)',
              additionalProperties: true,
            },
          },
        },
        NotFoundResponse: {
          type: 'object',
          required: ['message'],
          properties: {
            message: { type: 'string', example: 'User not found' },
          },
        },
        LoginFailure: {
          type: 'object',
          required: ['status', 'message'],
          properties: {
            status: { type: 'string', example: 'failed' },
            message: { type: 'string', example: 'Invalid email or password.' },
          },
        },
      },
    },
    tags: [
      { name: 'Health', description: 'Liveness and readiness' },
      { name: 'Users', description: 'User management' },
      { name: 'Auth', description: 'Credential check' },
    ],
  },
  apis: ['./src/infra/http/routes/*.ts'],
};

export const swaggerSpec = swaggerJsdoc(options);
