import swaggerJsdoc from 'swagger-jsdoc';

const options: swaggerJsdoc.Options = {
  definition: {
    openapi: '3.0.0',
    info: {
      title: 'Notes Vault API',
      version: '1.0.0',
      description: 'Per-user notes behind JWT bearer authentication',
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
            code: { type: 'string', example: 'UNAUTHORIZED' },
            message: { type: 'string', example: 'Invalid or expired token' },
            details: { type: 'object', additionalProperties: true },
          },
        },
        Note: {
          type: 'object',
          required: ['id', 'title', 'content', 'created_at'],
          properties: {
            id: { type: 'integer', example: 1 },
            title: { type: 'string', maxLength: 255 },
            content: { type: 'string', maxLength: 2000 },
            created_at: { type: 'string', format: 'date-time' },
          },
        },
      },
    },
    tags: [
      { name: 'Auth', description: 'Registration and login' },
      { name: 'Notes', description: 'The signed-in user\'s notes' },
    ],
  },
  apis: ['./src/infra/http/routes/*.ts'],
};

export const swaggerSpec = swaggerJsdoc(options);
