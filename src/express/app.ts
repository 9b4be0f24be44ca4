import express, { Express } from 'express';

import { CompositionRoot } from '../composition/root';
import { errorHandler, withRequestScope } from './middleware';
import { customersRouter } from './routes/customers';

export function createApp(root: CompositionRoot): Express {
  const app = express();
  app.use(express.json());
  app.use(withRequestScope(root));
  app.use('/api', customersRouter());
  app.use(errorHandler);
  return app;
}
