import { loadConfig } from './config';
import { createServer } from './createServer';
import { createMemoryStorage } from './storage/MemoryStorage';
import { createLogger, setLogLevel } from './utils/log';

const config = loadConfig();
setLogLevel(config.logLevel);

const log = createLogger('server');
const app = createServer({
  storage: createMemoryStorage(),
  capacityMode: config.capacityMode,
});

app.listen(config.port, config.host, () => {
  log.info(`listening on http://${config.host}:${config.port} (capacity: ${config.capacityMode})`);
});
