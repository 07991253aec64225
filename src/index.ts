import dotenv from 'dotenv';

import { createApp } from './app';
import { loadConfig } from './config';
import { describeError } from './errors';
import { createServices } from './services';

dotenv.config();

const main = async (): Promise<void> => {
  const config = loadConfig();
  const services = await createServices(config);
  const app = createApp(services);

  app.listen(config.port, () => {
    console.log(`Server listening on port ${config.port}`);
  });
};

main().catch((error: unknown) => {
  console.error(`Failed to start server: ${describeError(error)}`);
  process.exit(1);
});
