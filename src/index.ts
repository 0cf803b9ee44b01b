import express from 'express';
import cors from 'cors';
import projectRoutes from './routes/projects';
import detectionRoutes from './routes/detections';
import catalogRoutes from './routes/catalog';
import { isDatabaseConfigured } from './services/database';
import { loadConfig } from './services/config';
import { getEngineContext } from './services/context';

const config = loadConfig();
const app = express();
const PORT = config.port;

app.use(cors());
app.use(express.json({ limit: '5mb' })); // large detection batches

// Health check
app.get('/health', (req, res) => {
  res.json({
    status: 'ok',
    version: '1.0.0',
    store: getEngineContext(config).store.kind,
    database: isDatabaseConfigured() ? 'configured' : 'not configured',
    matching: {
      auto_match_threshold: config.matching.autoMatchThreshold,
      review_threshold: config.matching.reviewThreshold,
      class_filter: config.matching.classFilter
    }
  });
});

app.use('/api/v1/projects', projectRoutes);
app.use('/api/v1/detections', detectionRoutes);
app.use('/api/v1/catalog', catalogRoutes);

async function startServer() {
  const dbConfigured = isDatabaseConfigured();
  const ctx = getEngineContext(config);
  const dbConnected = dbConfigured && await ctx.store.ping();

  app.listen(PORT, () => {
    console.log(`🚀 Component Estimator API v1.0 running on port ${PORT}`);
    console.log('');
    console.log('📊 Database Status:');
    if (!dbConfigured) {
      console.log('   ⚠️  Not configured - using in-memory store with sample catalog');
    } else if (dbConnected) {
      console.log('   ✅ Connected to Supabase');
    } else {
      console.log('   ❌ Configured but connection failed');
    }
    console.log(`   Store:        ${ctx.store.kind}`);
    console.log('');
    console.log('📌 API Endpoints:');
    console.log(`   Health:       http://localhost:${PORT}/health`);
    console.log(`   Projects:     http://localhost:${PORT}/api/v1/projects`);
    console.log(`   Detections:   http://localhost:${PORT}/api/v1/detections/:detectionId`);
    console.log(`   Catalog:      http://localhost:${PORT}/api/v1/catalog`);
  });
}

startServer().catch(err => {
  console.error('❌ Failed to start server:', err);
  process.exit(1);
});

export default app;
