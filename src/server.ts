import 'dotenv/config';
import helmet from 'helmet';
import express from 'express';
import classifyRoutes from './routes/classify.js';
import normalizeRoutes from './routes/normalize.js';
import profileRoutes from './routes/profiles.js';
import metricsRoutes from './routes/metrics.js';
import { correlationId, defaultLimiter, errorResponder, strictLimiter } from './middleware/index.js';

const app = express();

app.use(helmet());
app.use(express.json({ limit: '5mb' }));

app.get('/api/health', (req, res) => {
  return res
    .status(200)
    .json({ status: 'ok', timestamp: new Date().toISOString() });
});

app.use(defaultLimiter);
app.use(correlationId);

app.use('/classify', classifyRoutes);
app.use('/normalize', normalizeRoutes);
app.use('/profiles', profileRoutes);
app.use('/metrics', strictLimiter, metricsRoutes);

app.use((req, res) => {
  res.status(404).json({ error: `No route for ${req.method} ${req.path}` });
});

app.use(errorResponder);

export default app;
