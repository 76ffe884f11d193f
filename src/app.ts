import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import logger from './utils/logger';
import { correlationIdOf, requestTracking } from './utils/apm';
import { AppError, hasHttpStatus } from './utils/errors';
import type { AppConfig } from './utils/config';
import type { AppContext } from './context';

import { PersonController } from './controllers/person.controller';
import { MedicalRecordController } from './controllers/medicalRecord.controller';
import { FireStationController } from './controllers/fireStation.controller';
import { AlertController } from './controllers/alert.controller';
import { createPersonRoutes } from './routes/person.routes';
import { createMedicalRecordRoutes } from './routes/medicalRecord.routes';
import { createFireStationRoutes } from './routes/fireStation.routes';
import { createAlertRoutes } from './routes/alert.routes';

export type HttpConfig = Pick<AppConfig, 'env' | 'corsOrigins' | 'rateLimit'>;

const buildCorsOptions = (allowedOrigins: string[]): cors.CorsOptions => ({
  origin: (origin, callback) => {
    // Requests without an origin (curl, server to server) and open configurations pass
    if (!origin || allowedOrigins.length === 0 || allowedOrigins.includes(origin)) {
      callback(null, true);
      return;
    }
    logger.warn('CORS request blocked', { origin, allowedOrigins });
    callback(null, false);
  },
  methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
  allowedHeaders: ['Content-Type', 'X-Correlation-ID'],
  optionsSuccessStatus: 204,
});

export const createApp = (context: AppContext, config: HttpConfig) => {
  const app = express();
  const isProduction = config.env === 'production';

  app.use(helmet());

  app.use(rateLimit({
    windowMs: config.rateLimit.windowMs,
    max: config.rateLimit.max,
    standardHeaders: true,
    legacyHeaders: false,
    message: { message: 'Too many requests from this IP, please try again later.' },
    skip: (req) => !isProduction && req.ip === '::1'
  }));

  const corsOptions = buildCorsOptions(config.corsOrigins);
  app.use(cors(corsOptions));
  app.options(/.*/, cors(corsOptions));
  app.use(requestTracking);
  app.use(express.json({ limit: '1mb' }));

  const { services } = context;
  const alerts = new AlertController(services.persons, services.fireStations);

  app.use('/person', createPersonRoutes(new PersonController(services.persons)));
  app.use('/medicalRecord', createMedicalRecordRoutes(new MedicalRecordController(services.medicalRecords)));
  app.use('/firestation', createFireStationRoutes(new FireStationController(services.fireStations), alerts));
  app.use('/', createAlertRoutes(alerts));

  app.get('/healthz', (_req, res) => {
    res.status(200).json({ status: 'ok' });
  });

  // 404 handler
  app.use((req, res) => {
    res.status(404).json({ message: 'Not Found', path: req.path });
  });

  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  app.use((err: unknown, req: express.Request, res: express.Response, _next: express.NextFunction) => {
    const correlationId = correlationIdOf(res);

    if (err instanceof AppError && err.status < 500) {
      logger.warn('Request rejected', { correlationId, kind: err.kind, message: err.message, path: req.path, method: req.method });
      res.status(err.status).json({ message: err.message, kind: err.kind });
      return;
    }

    if (!(err instanceof AppError) && hasHttpStatus(err) && err.status < 500) {
      logger.warn('Malformed request', { correlationId, status: err.status, message: err.message, path: req.path });
      res.status(err.status).json({ message: err.message || 'Bad request', kind: 'INVALID_INPUT' });
      return;
    }

    const errorId = Math.random().toString(36).substring(7);
    logger.error('Unhandled error', {
      errorId,
      correlationId,
      error: err,
      message: err instanceof Error ? err.message : String(err),
      stack: err instanceof Error ? err.stack : undefined,
      path: req.path,
      method: req.method
    });

    // Internal details stay in the logs in production
    res.status(500).json({
      message: isProduction || !(err instanceof Error) ? 'Internal server error' : err.message,
      kind: 'INTERNAL',
      errorId
    });
  });

  return app;
};
