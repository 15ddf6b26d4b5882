import { createApp, startServer, stopServer } from './app.js';
import { createLogger, loadSettings } from '@sonar-exporter/server';

const log = createLogger('server');

async function main(): Promise<void> {
	try {
		const settings = loadSettings();
		log.info(
			{
				sonarUrl: settings.sonarUrl,
				authenticated: settings.sonarToken !== undefined,
				timeoutMs: settings.requestTimeoutMs,
				publishPartial: settings.publishPartial
			},
			'Settings loaded'
		);

		const app = await createApp({ settings });
		await startServer(app, settings.port, settings.host);

		// Graceful shutdown handlers
		const shutdown = async (signal: string): Promise<void> => {
			log.info(`${signal} received, shutting down gracefully`);

			try {
				await stopServer(app);
				process.exit(0);
			} catch (error) {
				log.error({ err: error }, 'Error during shutdown');
				process.exit(1);
			}
		};

		process.on('SIGTERM', () => void shutdown('SIGTERM'));
		process.on('SIGINT', () => void shutdown('SIGINT'));
	} catch (error) {
		log.fatal({ err: error }, 'Failed to start server');
		process.exit(1);
	}
}

void main();
