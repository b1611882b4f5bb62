import { createApp, SERVICE_NAME } from './app.js';
import { loadConfig } from './config.js';

const config = loadConfig();
const app = createApp(config);

app.listen(config.port, () => {
  console.log(`${SERVICE_NAME} listening on port ${config.port}`);
});
