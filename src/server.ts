import 'dotenv/config';
import { loadConfig, ConfigurationError } from './modules/config/index.js';
import { createCollaborators } from './modules/services/index.js';
import { createOrchestrator } from './modules/coordinator/index.js';
import { createApp, SERVICE_NAME } from './modules/api/index.js';

/**
 * Application entry point
 *
 * Loads configuration, wires the collaborators and coordinators, and starts
 * the Express server.
 */
async function main() {
  console.log(`Starting ${SERVICE_NAME}...`);

  try {
    const config = loadConfig();
    const orchestrator = createOrchestrator(config, createCollaborators(config));

    // Create Express app with API routes
    const app = createApp(orchestrator, {
      enableCors: true,
      enableLogging: config.requestLogging && process.env.NODE_ENV !== 'test',
    });

    // Start HTTP server
    const server = app.listen(config.port, () => {
      console.log(`${SERVICE_NAME} running on http://localhost:${config.port}`);
      console.log('\nEvents:');
      console.log('  POST   /events/like              - Record a like');
      console.log('  POST   /events/daily_batch       - Run the daily batch');
      console.log('  POST   /events/manual_generate   - Generate prompts');
      console.log('\nIntrospection:');
      console.log('  GET    /health                   - Health check');
      console.log('  GET    /status                   - Orchestrator state');
      console.log('  GET    /scores                   - Cached structure scores');
      console.log('\nAdmin:');
      console.log('  POST   /trigger_retrain          - Force a learning cycle');
      console.log('  POST   /reset_counter            - Reset the like counter');
      console.log('\nLearning:');
      console.log(`  Like threshold: ${config.learning.likeThreshold}`);
      console.log(`  Exploration rate: ${config.learning.explorationRate}`);
      console.log(`  Record store: ${config.recordStore ? 'enabled' : 'disabled'}`);
    });

    // Graceful shutdown handling
    let shuttingDown = false;
    const shutdown = async (signal: string) => {
      if (shuttingDown) return;
      shuttingDown = true;
      console.log(`\nReceived ${signal}. Shutting down gracefully...`);

      // Force exit once the grace period runs out
      setTimeout(() => {
        console.error('Forced shutdown after timeout');
        process.exit(1);
      }, config.shutdownGraceMs).unref();

      server.close(() => {
        console.log('HTTP server closed.');
      });

      if (orchestrator.learningCycle.isRunning()) {
        console.log('Waiting for the in-flight learning cycle to finish...');
      }
      await orchestrator.learningCycle.whenIdle();
      console.log('Learning cycle idle.');
      process.exit(0);
    };

    process.on('SIGTERM', () => {
      void shutdown('SIGTERM');
    });
    process.on('SIGINT', () => {
      void shutdown('SIGINT');
    });
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error('Configuration error:');
      for (const issue of error.issues) {
        console.error(`  - ${issue}`);
      }
    } else {
      console.error('Failed to start application:', error);
    }
    process.exit(1);
  }
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
