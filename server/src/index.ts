import { createApp } from './app';
import { logInfo } from './observability/logger';

const port = Number(process.env.PORT ?? 3000);

createApp().listen(port, () => {
  logInfo('api_server_started', { port });
});
