import { loadConfig } from './config.js';
import { createLogger } from './logger.js';
import { createApp } from './app.js';

const config = loadConfig();
const logger = createLogger(config);
const { app } = createApp({ config, logger });

app.listen(config.PORT, () => {
  logger.info(`Stress dashboard API listening on http://localhost:${config.PORT}`);
  logger.info(`CORS origin: ${config.CORS_ORIGIN}`);
});
