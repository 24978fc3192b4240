/**
 * Native entry point: Node.js, dialog-based storage, terminal keyboard.
 *
 *   retrohost [--rom <path>] [--fps <n>] [--cap <n>] [--no-audio]
 *
 * Keys: arrows/x/z/enter/space play; o open ROM, s save state, l load state,
 * r reset, p pause, q quit.
 */

import { emitKeypressEvents } from 'node:readline';

import * as Sentry from '@sentry/node';

import { parseArgs } from '@/config/cliArgs';
import { parseHostConfig, type HostConfig } from '@/config/hostConfig';
import { configDir, fileStore, readConfigFile } from '@/config/nativeConfig';
import { ClockedSink } from '@/emulator/audio/ClockedSink';
import GamepadController, { noGamepads } from '@/emulator/controllers/GamepadController';
import { InputAggregator } from '@/emulator/controllers/InputAggregator';
import KeyboardController from '@/emulator/controllers/KeyboardController';
import { TerminalKeys, type Keypress } from '@/emulator/controllers/TerminalKeys';
import { EmulationCoreHandle } from '@/emulator/cores/EmulationCoreHandle';
import { JsnesCore } from '@/emulator/cores/jsnesAdapter';
import { errorMessage } from '@/emulator/errors';
import { HostLoop } from '@/emulator/HostLoop';
import { createRetroStore } from '@/emulator/state/retroStore';
import { NativeStorage } from '@/emulator/storage/NativeStorage';
import { handleError } from '@/emulator/utils/errorUtils';
import FramePacer from '@/emulator/utils/FramePacer';
import { describeRom } from '@/emulator/utils/rom';
import { timerDriver } from '@/emulator/utils/timerDriver';
import { HeadlessSurface } from '@/emulator/video/HeadlessSurface';

const SAMPLE_RATE = 44100;

async function loadConfig(): Promise<HostConfig> {
  const fileConfig = await readConfigFile();
  const cli = parseArgs(process.argv.slice(2));
  const base = typeof fileConfig === 'object' && fileConfig !== null ? fileConfig : {};
  return parseHostConfig({ ...base, ...cli });
}

async function main(): Promise<void> {
  const config = await loadConfig();
  if (config.sentryDsn) {
    Sentry.init({ dsn: config.sentryDsn });
  }
  console.log('[retrohost] config directory:', configDir());

  const store = createRetroStore();
  const inputStore = fileStore();

  const keyboard = new KeyboardController(inputStore);
  keyboard.loadKeys();
  if (config.keymap) keyboard.setKeys(config.keymap);

  const gamepads = new GamepadController(noGamepads, inputStore);
  gamepads.loadGamepadConfig();
  if (config.gamepad) gamepads.setGamepadConfig(config.gamepad);

  const core = new EmulationCoreHandle(new JsnesCore(SAMPLE_RATE, config.audio.enabled));
  const audio = new ClockedSink(SAMPLE_RATE, config.audio.bufferSize);
  const pacer = new FramePacer({ fps: config.fps, catchUpCap: config.catchUpCap });

  const loop = new HostLoop({
    core,
    pacer,
    input: new InputAggregator(keyboard, gamepads),
    storage: new NativeStorage({ preselectRom: config.romPath }),
    surface: new HeadlessSurface(),
    audio,
    store,
    onStorageEvent: (event) => {
      if (event.kind === 'load-rom' && event.status === 'applied') {
        console.log(describeRom(event.info, event.name));
      }
    },
  });

  store.subscribe((state, previous) => {
    if (state.status !== previous.status) console.log('[retrohost] status:', state.status);
    if (state.notice && state.notice !== previous.notice) console.warn('[retrohost]', state.notice.message);
    if (state.romInfo?.sha256 && state.romInfo.sha256 !== previous.romInfo?.sha256) {
      console.log('[retrohost] ROM sha256:', state.romInfo.sha256);
    }
  });

  const driver = timerDriver((now) => {
    loop.tick(now);
  });
  const terminal = new TerminalKeys(keyboard);

  const shutdown = () => {
    driver.stop();
    audio.stop();
    terminal.dispose();
    if (process.stdin.isTTY) process.stdin.setRawMode(false);
    process.stdin.pause();
  };

  const run = (action: () => void) => {
    try {
      action();
    } catch (error) {
      console.warn('[retrohost]', errorMessage(error));
    }
  };

  emitKeypressEvents(process.stdin);
  if (process.stdin.isTTY) process.stdin.setRawMode(true);
  process.stdin.on('keypress', (_text: string | undefined, key: Keypress | undefined) => {
    if (!key) return;
    if (terminal.press(key)) return;
    if ((key.ctrl && key.name === 'c') || key.name === 'q') {
      shutdown();
      return;
    }
    switch (key.name) {
      case 'o':
        run(() => loop.requestRom());
        break;
      case 's':
        run(() => loop.saveState());
        break;
      case 'l':
        run(() => loop.requestSaveState());
        break;
      case 'r':
        run(() => loop.reset());
        break;
      case 'p':
        if (loop.isPaused) {
          loop.resume(performance.now());
        } else {
          loop.pause();
        }
        break;
    }
  });
  process.once('SIGINT', shutdown);

  loop.requestRom();
  audio.start();
  driver.start();
}

main().catch((error: unknown) => {
  handleError(error);
  process.exit(1);
});
