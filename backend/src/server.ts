import { buildApp } from './app.js';
import { config, isDevelopment } from './config/app.js';
import { createAgentRuntime } from './services/agentFactory.js';

const logger = {
  level: config.LOG_LEVEL,
  transport: isDevelopment
    ? {
        target: 'pino-pretty',
        options: {
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname'
        }
      }
    : undefined
};

let app: Awaited<ReturnType<typeof buildApp>> | null = null;

const runtime = createAgentRuntime({
  thoughtSink: (thought) => app?.log.info({ thought }, 'agent thought')
});

app = await buildApp({ chatService: runtime.chatService, logger });

if (!(await runtime.schemeIndex.isReady())) {
  app.log.warn('Scheme index is empty; run `npm run build-index` before searching schemes.');
}

const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];
signals.forEach((signal) => {
  process.once(signal, () => {
    app?.log.info(`Received ${signal}, shutting down gracefully.`);
    const closing = app ? app.close() : Promise.resolve();
    closing
      .then(() => {
        runtime.close();
        process.exit(0);
      })
      .catch((error: unknown) => {
        console.error('Shutdown failed:', error);
        process.exit(1);
      });
  });
});

try {
  await app.listen({ port: config.PORT, host: '0.0.0.0' });
} catch (error) {
  app.log.error(error);
  runtime.close();
  process.exit(1);
}
