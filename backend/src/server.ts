import { config } from './config/app.js';
import { buildServer } from './app.js';
import { getSessionStore } from './services/sessionStore.js';

const app = await buildServer();

const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];
signals.forEach((signal) => {
  process.once(signal, () => {
    app.log.info(`Received ${signal}, shutting down gracefully.`);
    app
      .close()
      .then(() => {
        getSessionStore().close();
        process.exit(0);
      })
      .catch((error: unknown) => {
        app.log.error(error, 'Shutdown failed');
        process.exit(1);
      });
  });
});

try {
  await app.listen({ port: config.PORT, host: '0.0.0.0' });
  app.log.info(`Backend running on http://localhost:${config.PORT}`);
} catch (error) {
  app.log.error(error);
  process.exit(1);
}
