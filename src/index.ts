import dotenv from 'dotenv';
import { createApp } from './app';
import { createReviewAnalyzerFromConfig } from './analysis/analyzer';
import { loadConfig } from './config/config';

dotenv.config();

const config = loadConfig();
const app = createApp(createReviewAnalyzerFromConfig(config));

app.listen(config.port, () => {
  // eslint-disable-next-line no-console
  console.log(`Backend listening on port ${config.port} (model ${config.model})`);
});
