import 'reflect-metadata';
import { appConfig } from './config/appConfig';
import { createApp } from './app';

const app = createApp();

app.listen(appConfig.port, () => {
  console.log(`✓ Server running on http://localhost:${appConfig.port}`);
  console.log(`✓ Health check: http://localhost:${appConfig.port}/health`);
  console.log(`✓ API docs: http://localhost:${appConfig.port}/docs`);
  console.log(`✓ Environment: ${appConfig.nodeEnv}`);
});
