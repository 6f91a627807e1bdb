import app from './server.js';
import { installFileLogger } from './utils/logger/fileLogger.js';
import { getConfigurationManager } from './differential/ConfigurationManager.js';
import { getProfileRegistry } from './differential/ProfileRegistry.js';

function startServer() {
  installFileLogger();

  const config = getConfigurationManager().getConfig();

  // Fail fast on a broken profile table
  const registry = getProfileRegistry();
  console.log(`Loaded ${registry.listProfiles().length} server profiles from ${config.profilesPath}`);

  if (config.profilesReloadIntervalMs > 0) {
    registry.startWatching(config.profilesReloadIntervalMs);
  }

  app.listen(config.port, () => {
    console.log(`Discrepancy classifier listening on port ${config.port}`);
  });
}

try {
  startServer();
} catch (error) {
  console.error('Failed to start discrepancy classifier:', error);
  process.exit(1);
}
