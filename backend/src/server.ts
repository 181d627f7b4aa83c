import express, { Application } from 'express';
import cors from 'cors';
import dotenv from 'dotenv';
import { connectDatabase } from './config/database';
import { connectRedis } from './config/redis';
import { createSessionRouter } from './routes/sessionRoutes';
import { errorHandler } from './middlewares/errorHandler';
import { SessionManager, createSessionManager } from './services/interview-orchestrator/sessionManager';

// Load environment variables
dotenv.config();

export const createApp = (manager: SessionManager): Application => {
  const app = express();

  app.use(cors({
    origin: process.env.FRONTEND_URL || 'http://localhost:3000',
    credentials: true,
  }));
  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', sessions: manager.size, timestamp: new Date().toISOString() });
  });

  app.use('/api/sessions', createSessionRouter(manager));

  // Error handling middleware (must be last)
  app.use(errorHandler);

  return app;
};

const PORT = process.env.PORT || 5000;

const startServer = async () => {
  try {
    // Logs and snapshots are optional: the interview runs without them.
    await connectDatabase().catch((error) => console.warn('⚠️  Interview logs disabled:', error));
    await connectRedis().catch((error) => console.warn('⚠️  Session snapshots disabled:', error));

    const app = createApp(createSessionManager());
    app.listen(PORT, () => {
      console.log(`✓ Server running on port ${PORT}`);
      console.log(`✓ Environment: ${process.env.NODE_ENV || 'development'}`);
    });
  } catch (error) {
    console.error('Failed to start server:', error);
    process.exit(1);
  }
};

if (require.main === module) {
  process.on('SIGTERM', () => {
    console.log('SIGTERM signal received: closing server gracefully');
    process.exit(0);
  });

  process.on('SIGINT', () => {
    console.log('SIGINT signal received: closing server gracefully');
    process.exit(0);
  });

  void startServer();
}
