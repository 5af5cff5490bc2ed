/* eslint-disable no-console */
import 'dotenv/config';
import express from 'express';
import path from 'path';
import { loadConfig } from '../core/utils';
import { registerRoutes } from './routes';

const config = loadConfig(path.resolve(process.cwd(), 'src/config/default.json'));
const app = express();

registerRoutes(app, { resultsDir: config.resultsDir });

const startServer = (port: number, bind: string, allowFallback = true) => {
  const server = app.listen(port, bind, () => {
    const address = server.address();
    const boundPort = typeof address === 'object' && address ? address.port : port;
    console.log(`Report UI running at http://${bind}:${boundPort}`);
  });
  server.on('error', (err: NodeJS.ErrnoException) => {
    if (allowFallback && (err.code === 'EACCES' || err.code === 'EADDRINUSE')) {
      console.warn(`UI port ${port} unavailable (${err.code}); retrying on an ephemeral port.`);
      startServer(0, bind, false);
      return;
    }
    console.error('UI failed to start', err);
    process.exitCode = 1;
  });
};

startServer(config.uiPort, config.uiBind);
