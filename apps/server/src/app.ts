import express from 'express';
import cors from 'cors';
import { createAnnotateRouter, type AnnotateDeps } from './routes/annotate';

export function createApp(deps: AnnotateDeps) {
  const app = express();

  // CORS for the local dev front ends; in production a proxy in front of the API sets the headers
  if (process.env.NODE_ENV !== 'production') {
    app.use(cors({
      origin: ['http://localhost:5173', 'http://localhost:3000'],
      credentials: true,
    }));
  }

  app.use('/api', createAnnotateRouter(deps));
  return app;
}
