// Load environment variables first
import 'dotenv/config';

import mongoose from 'mongoose';
import logger from 'jet-logger';

import ENV from '@src/common/constants/ENV';
import connectDB from '@src/config/database';
import { closeServices, createServices } from '@src/config/services';
import { createServer } from './server';


/******************************************************************************
                                Constants
******************************************************************************/

const SERVER_START_MSG = (
  'Express server started on port: ' + ENV.Port.toString()
);


/******************************************************************************
                                  Run
******************************************************************************/

async function main(): Promise<void> {
  await connectDB(ENV.MongodbUri);

  const services = createServices();
  const server = createServer(services).listen(ENV.Port, () => {
    logger.info(SERVER_START_MSG);
  });

  const shutdown = (signal: string): void => {
    logger.info(`${signal} received, finishing in-flight uploads...`);
    server.close();
    services.orchestrator.drain()
      .then(() => mongoose.connection.close())
      .then(() => {
        closeServices(services);
        logger.info('MongoDB connection closed through app termination');
        process.exit(0);
      })
      .catch((error: unknown) => {
        logger.err(error, true);
        process.exit(1);
      });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error: unknown) => {
  logger.err(error, true);
  process.exit(1);
});
