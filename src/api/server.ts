import express, { type Express } from 'express';
import type { Server } from 'http';
import { toJson } from '../arrivals';
import type { AppConfig } from '../config';
import { INVALID_CODE_MESSAGE, UNABLE_TO_FETCH_MESSAGE } from '../errors';
import { isValidCode } from '../naptan';
import type { TimetableSource } from '../timetable/client';
import type { Logger } from '../utils/logger';

interface ApiDependencies {
  client: TimetableSource;
  config: Pick<AppConfig, 'codeLength' | 'denyList'>;
  logger: Logger;
}

export function createApiApp({ client, config, logger }: ApiDependencies): Express {
  const app = express();

  app.use((req, _res, next) => {
    logger.info(`${req.method} ${req.originalUrl}`, { ip: req.ip });
    next();
  });

  app.get('/check_buses', async (req, res) => {
    const naptan = typeof req.query.naptan === 'string' ? req.query.naptan : '';
    if (!isValidCode(naptan, config)) {
      res.status(400).json({ error: INVALID_CODE_MESSAGE });
      return;
    }

    try {
      const buses = await client.getBuses(naptan);
      res.json(buses.map(toJson));
    } catch (error) {
      logger.warn('Failed to fetch buses', { naptan, message: String(error) });
      res.status(400).json({ error: UNABLE_TO_FETCH_MESSAGE });
    }
  });

  return app;
}

/** Resolves once the server listens; a failure to bind (EADDRINUSE, EACCES) rejects. */
export function startApiServer(
  deps: ApiDependencies & { config: Pick<AppConfig, 'codeLength' | 'denyList' | 'apiHost' | 'apiPort'> },
): Promise<Server> {
  const { apiHost, apiPort } = deps.config;
  return new Promise((resolve, reject) => {
    const server = createApiApp(deps).listen(apiPort, apiHost);

    const onStartupError = (error: Error) => {
      deps.logger.error('Unable to start the API server', { host: apiHost, port: apiPort, message: error.message });
      reject(error);
    };
    server.once('error', onStartupError);
    server.once('listening', () => {
      server.off('error', onStartupError);
      server.on('error', (error) => {
        deps.logger.error('API server error', { message: error.message });
      });
      deps.logger.info(`API is up on ${apiHost}:${apiPort}`);
      resolve(server);
    });
  });
}
