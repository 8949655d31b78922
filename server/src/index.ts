// ============================================================
// Doc Analyzer - Express Server Entry Point
// ============================================================

import { ClaudeAgentService } from '@agent/service';
import { loadConfigFromEnv } from '@shared/config';
import { setLogLevel } from '@shared/logger';
import { createApp } from './app';

const config = loadConfigFromEnv();
setLogLevel(config.logLevel);

const service = new ClaudeAgentService(config);
const app = createApp(service);
const PORT = process.env.PORT ? parseInt(process.env.PORT, 10) : 3456;

app.listen(PORT, () => {
  console.log(`\n  Doc Analyzer server running at http://localhost:${PORT}`);
  console.log(`  Model: ${config.model}, timeout: ${config.timeoutSeconds}s\n`);
});
