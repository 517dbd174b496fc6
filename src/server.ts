import { config } from './config';
import { createApp } from './app';
import { filtersModel } from './models/filters';
import { historyModel } from './models/history';
import { settingsModel } from './models/settings';
import { showsModel } from './models/shows';
import { feedFetcher } from './rss/fetchFeeds';
import { DownloadDispatcher } from './services/downloadDispatcher';
import { flush, logger } from './services/structuredLogging';
import { Tracker } from './services/tracker';
import transmissionClient from './transmission/client';
import { errorMessage } from './utils/errors';

filtersModel.seedDefaults();

const tracker = new Tracker({
  shows: showsModel,
  filters: filtersModel,
  history: historyModel,
  settings: settingsModel,
  feeds: feedFetcher,
  dispatcher: new DownloadDispatcher(transmissionClient, historyModel),
});

const app = createApp(tracker);

const server = app.listen(config.port, () => {
  console.log(`Server running on port ${config.port}`);
});

// Initial poll on startup; later cycles are scheduled by the tracker
console.log('Starting initial poll cycle...');
tracker.start().catch((error) => {
  logger.error('tracker', `Initial poll cycle error: ${errorMessage(error)}`, { error });
});

let shuttingDown = false;

async function shutdown(signal: string) {
  if (shuttingDown) return;
  shuttingDown = true;
  console.log(`${signal} received, waiting for the current poll cycle to finish...`);
  try {
    await tracker.stop();
  } catch (error) {
    console.error('Error while stopping tracker:', error);
  }
  flush();
  server.close(() => process.exit(0));
}

process.on('SIGINT', () => {
  void shutdown('SIGINT');
});
process.on('SIGTERM', () => {
  void shutdown('SIGTERM');
});
