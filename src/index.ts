import dotenv from 'dotenv';
import { createApp } from './app';
import { loadConfig } from './config';
import { createServices } from './container';
import { EmailNotifier, createMailTransport } from './services/notifier';
import { XSocialPoster } from './services/socialPoster';

dotenv.config();

const config = loadConfig();
const notifier = new EmailNotifier(createMailTransport(config.mail), config.mail.from);
const services = createServices({
  config,
  notifier,
  socialPoster: new XSocialPoster(config.social.apiBaseUrl, config.queue.taskTimeoutMs)
});

const server = createApp(services).listen(config.port, () => {
  console.log(`🚀 Server running on http://localhost:${config.port}`);
});

const shutdown = (signal: string) => {
  console.log(`🛑 ${signal} received, draining side-effect queue...`);
  server.close();
  services.queue
    .onIdle()
    .then(() => {
      services.queue.stop();
      notifier.close();
      process.exit(0);
    })
    .catch((error: unknown) => {
      console.error('❌ Shutdown failed:', error);
      process.exit(1);
    });
};

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
