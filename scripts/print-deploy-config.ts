import 'dotenv/config';
import { loadConfig } from '../src/infrastructure/config.js';

// Resolved deploy-time settings, for the provisioning tooling to consume.
try {
  const { deploy } = loadConfig();
  console.log(JSON.stringify(deploy, null, 2));
} catch (error) {
  console.error(error instanceof Error ? error.message : error);
  process.exit(1);
}
