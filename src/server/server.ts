import { loadConfig, loadEnvFile } from './config';
import { createApp } from './app';

// Load environment variables from .env file
loadEnvFile();

const config = loadConfig();
const app = createApp(config);

app.listen(config.port, () => {
  console.log(`[Server] ${config.serviceName} listening on http://localhost:${config.port}`);
  console.log(`[Server] Temporary workbooks in ${config.tmpDir}`);
});
