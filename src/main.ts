// main.ts
// Terminal front end.  Connects to the game server, draws frames as text and
// forwards key presses.  With --local, or when the server cannot be reached,
// the session runs in this process instead.

import readline from 'node:readline';
import { pathToFileURL } from 'node:url';
import { CFG_DEFAULT } from './config.ts';
import { GameSession } from './session.ts';
import { FrameSerializer } from './serializer.ts';
import { projectFrame, type RenderFrame } from './projection.ts';
import { renderAscii } from './render.ts';
import { buildTitleSnakes } from './titleScreen.ts';
import { KeyPoll, keyFromKeypress, keyToEvent, type KeyName } from './input.ts';
import { createWsClient, resolveServerUrl } from './net/wsClient.ts';

/** Options read from the command line. */
export interface ClientArgs {
  url: string;
  local: boolean;
  spectate: boolean;
  name?: string;
}

/** Shape of the key object readline passes to keypress listeners. */
interface Keypress {
  name?: string;
  ctrl?: boolean;
  sequence?: string;
}

/** Clear the screen and move the cursor home. */
const CLEAR = '\x1b[H\x1b[J';

/**
 * Parse client flags.
 * @param argv - Arguments after the script name.
 * @param env - Environment used for the default server URL.
 */
export function parseClientArgs(
  argv: readonly string[],
  env: NodeJS.ProcessEnv = process.env
): ClientArgs {
  const args: ClientArgs = {
    url: resolveServerUrl(argv, env),
    local: argv.includes('--local'),
    spectate: argv.includes('--spectate')
  };
  const nameIndex = argv.indexOf('--name');
  const name = nameIndex >= 0 ? argv[nameIndex + 1] : undefined;
  if (name) args.name = name;
  return args;
}

/**
 * Text for one screen: the rendered frame plus an optional status line.
 * @param frame - Frame to draw.
 * @param status - Connection or error message shown below the board.
 */
export function drawFrame(frame: RenderFrame, status = ''): string {
  const lines = renderAscii(frame, CFG_DEFAULT);
  if (status) lines.push('', status);
  return CLEAR + lines.join('\n') + '\n';
}

function listenForKeys(onKey: (key: KeyName) => void, onInterrupt: () => void): () => void {
  readline.emitKeypressEvents(process.stdin);
  if (process.stdin.isTTY) process.stdin.setRawMode(true);
  const listener = (str: string | undefined, key: Keypress | undefined) => {
    if (key?.ctrl && key.name === 'c') {
      onInterrupt();
      return;
    }
    const name = keyFromKeypress(key?.name, key?.sequence ?? str);
    if (name) onKey(name);
  };
  process.stdin.on('keypress', listener);
  process.stdin.resume();
  return () => {
    process.stdin.off('keypress', listener);
    if (process.stdin.isTTY) process.stdin.setRawMode(false);
    process.stdin.pause();
  };
}

/** Run the session in this process at 60 ticks per second. */
function runLocal(status: string): void {
  const session = new GameSession();
  const titleSnakes = buildTitleSnakes(session.grid);
  const keys = new KeyPoll();
  let stopKeys = () => {};
  const timer = setInterval(() => {
    if (session.update(keys.poll()).quit) {
      finish();
      return;
    }
    process.stdout.write(drawFrame(projectFrame(session, titleSnakes), status));
  }, 1000 / 60);
  const finish = () => {
    clearInterval(timer);
    stopKeys();
    process.stdout.write(CLEAR);
    process.exit(0);
  };
  stopKeys = listenForKeys((key) => keys.press(key), finish);
}

/** Connect to the server; fall back to a local session if it never answers. */
function runRemote(args: ClientArgs): void {
  let welcomed = false;
  let status = `connecting to ${args.url}`;
  let lastFrame: RenderFrame | null = null;
  let stopKeys = () => {};

  const redraw = () => {
    if (lastFrame) process.stdout.write(drawFrame(lastFrame, status));
  };
  const finish = (code: number) => {
    stopKeys();
    client.disconnect();
    process.stdout.write(CLEAR);
    if (status) console.log(status);
    process.exit(code);
  };

  const client = createWsClient({
    onConnected: (info) => {
      welcomed = true;
      status = `session ${info.sessionId}`;
      client.sendJoin(args.spectate ? 'spectator' : 'player', args.name);
    },
    onAssign: (msg) => {
      status = msg.role === 'player' ? '' : 'watching (another player is connected)';
      redraw();
    },
    onFrame: (bytes) => {
      try {
        lastFrame = FrameSerializer.decode(bytes);
      } catch (err) {
        status = `bad frame: ${err instanceof Error ? err.message : String(err)}`;
        return;
      }
      redraw();
    },
    onError: (msg) => {
      status = msg.message;
      redraw();
    },
    onBye: (msg) => {
      status = msg.reason === 'quit' ? '' : 'server shut down';
      finish(0);
    },
    onDisconnected: () => {
      if (welcomed) {
        finish(0);
        return;
      }
      stopKeys();
      runLocal(`offline: ${args.url} unreachable`);
    }
  });

  stopKeys = listenForKeys(
    (key) => client.sendInput(keyToEvent(key)),
    () => finish(0)
  );
  client.connect(args.url);
}

export function main(argv: readonly string[] = process.argv.slice(2)): void {
  const args = parseClientArgs(argv);
  if (args.local) {
    runLocal('local session');
    return;
  }
  runRemote(args);
}

if (import.meta.url === pathToFileURL(process.argv[1] ?? '').href) {
  main();
}
