import path from 'path';
import swaggerJsdoc from 'swagger-jsdoc';
import { Express } from 'express';
import swaggerUi from 'swagger-ui-express';

function normalizeBaseUrl(url: string): string {
  // Swagger joins paths onto `servers[0].url`; a trailing slash causes `//path`.
  return url.trim().replace(/\/+$/, '');
}

function computeServerOrigin(): string {
  const explicit = process.env.SWAGGER_SERVER_URL;
  if (explicit) return normalizeBaseUrl(explicit);

  const appUrl = process.env.APP_URL;
  if (appUrl) return normalizeBaseUrl(appUrl);

  return `http://localhost:${process.env.PORT || 5000}`;
}

const apiBasePath = (() => {
  const raw = process.env.API_BASE_PATH || '/api/v1';
  const trimmed = raw.trim();
  if (!trimmed.startsWith('/')) return `/${trimmed.replace(/\/+/g, '/')}`;
  return trimmed.replace(/\/+$/, '');
})();

const buildSpec = (): object =>
  swaggerJsdoc({
    definition: {
      openapi: '3.0.0',
      info: {
        title: 'SmartLearn Quiz API',
        version: '1.0.0',
        description: 'Randomized multiple-choice quizzes, exactly-once scoring and an XP leaderboard',
      },
      servers: [
        {
          url: `${computeServerOrigin()}${apiBasePath}`,
          description: process.env.NODE_ENV === 'production' ? 'Production server' : 'Development server',
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
      },
      security: [
        {
          bearerAuth: [],
        },
      ],
    },
    // Both the TypeScript sources and the compiled output carry the @openapi blocks
    apis: [path.join(__dirname, '../routes/**/*.ts'), path.join(__dirname, '../routes/**/*.js')],
  });

export const setupSwagger = (app: Express): void => {
  const spec = buildSpec();
  app.use('/docs', swaggerUi.serve, swaggerUi.setup(spec));
  app.get('/docs.json', (_req, res) => {
    res.json(spec);
  });
};
