import { createServer } from 'node:http';
import { pathToFileURL } from 'node:url';
import { randomBytes } from 'node:crypto';
import { CFG_DEFAULT } from '../src/config.ts';
import { screenSize } from '../src/projection.ts';
import { parseConfig, type ServerConfig } from './config.ts';
import { createHttpHandler } from './httpApi.ts';
import { createLogger, type Logger } from './logger.ts';
import { SERIALIZER_VERSION, type WelcomeMsg } from './protocol.ts';
import { GameServer } from './gameServer.ts';
import { WsHub } from './wsHub.ts';

export interface RunningServer {
  port: number;
  wsUrl: string;
  close: () => Promise<void>;
}

export interface StartServerOptions {
  logger?: Logger;
  /** Called after a player quit and the loop stopped. */
  onQuit?: () => void;
}

export async function startServer(config: ServerConfig, options: StartServerOptions = {}): Promise<RunningServer> {
  const logger = options.logger ?? createLogger(config.logLevel);
  const seed = config.seed ?? Math.floor(Math.random() * 1e9);
  const sessionId = randomBytes(4).toString('hex');
  const welcome: WelcomeMsg = {
    type: 'welcome',
    sessionId,
    tickRate: config.tickRateHz,
    frameRate: Math.min(config.frameRateHz, config.tickRateHz),
    grid: { width: CFG_DEFAULT.gridWidth, height: CFG_DEFAULT.gridHeight },
    tileSize: CFG_DEFAULT.tileSize,
    screen: screenSize(CFG_DEFAULT),
    serializerVersion: SERIALIZER_VERSION,
    seed
  };

  let gameServer: GameServer | null = null;

  const httpHandler = createHttpHandler({
    getStatus: () => gameServer?.getStatus() ?? null
  });

  const httpServer = createServer((req, res) => {
    httpHandler(req, res);
  });

  const wsHub = new WsHub(httpServer, welcome);
  const server = new GameServer(config, wsHub, {
    seed,
    logger,
    onQuit: () => options.onQuit?.()
  });
  gameServer = server;
  wsHub.setHandlers({
    onJoin: (connId, msg) => server.handleJoin(connId, msg.mode, msg.name),
    onInput: (connId, msg) => server.handleInput(connId, msg.event),
    onDisconnect: (connId) => server.handleDisconnect(connId),
    onProtocolError: (connId, reason) => logger.warn('ws', `conn ${connId} closed: ${reason}`)
  });

  await new Promise<void>((resolve, reject) => {
    const onError = (err: Error) => {
      httpServer.off('error', onError);
      reject(err);
    };
    httpServer.once('error', onError);
    httpServer.listen({ port: config.port, host: config.host }, () => {
      httpServer.off('error', onError);
      resolve();
    });
  });

  const address = httpServer.address();
  const port = typeof address === 'object' && address ? address.port : config.port;

  server.start();
  logger.info('server', `session ${sessionId} seed ${seed} at ${config.tickRateHz}Hz`);

  let closed = false;
  const close = async () => {
    if (closed) return;
    closed = true;
    server.stop();
    wsHub.sayGoodbye('shutdown');
    wsHub.closeAll();
    await new Promise<void>((resolve) => httpServer.close(() => resolve()));
  };

  const wsHost =
    config.host === '0.0.0.0' || config.host === '::' ? 'localhost' : config.host;
  return {
    port,
    wsUrl: `ws://${wsHost}:${port}`,
    close
  };
}

export async function main(): Promise<void> {
  const config = parseConfig(process.argv.slice(2), process.env);
  const logger = createLogger(config.logLevel);

  let closing = false;
  let server: RunningServer | null = null;
  const shutdown = async (code: number) => {
    if (closing) return;
    closing = true;
    logger.info('server', 'shutting down');
    await server?.close();
    process.exit(code);
  };

  server = await startServer(config, {
    logger,
    onQuit: () => {
      if (!config.exitOnQuit) return;
      shutdown(0).catch((err: unknown) => {
        logger.error('server', `shutdown failed: ${String(err)}`);
        process.exit(1);
      });
    }
  });
  logger.info('server', `listening on ${server.wsUrl}`);

  const onSignal = () => {
    shutdown(0).catch((err: unknown) => {
      logger.error('server', `shutdown failed: ${String(err)}`);
      process.exit(1);
    });
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
}

if (import.meta.url === pathToFileURL(process.argv[1] ?? '').href) {
  main().catch((err) => {
    console.error(err);
    process.exit(1);
  });
}
