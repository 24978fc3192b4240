/**
 * Browser entry point: canvas, Web Audio, Gamepad API, file-input storage.
 */

import * as Sentry from '@sentry/browser';

import { parseHostConfig } from '@/config/hostConfig';
import Speakers from '@/emulator/audio/Speakers';
import GamepadController, { browserGamepads } from '@/emulator/controllers/GamepadController';
import { InputAggregator } from '@/emulator/controllers/InputAggregator';
import KeyboardController from '@/emulator/controllers/KeyboardController';
import { EmulationCoreHandle } from '@/emulator/cores/EmulationCoreHandle';
import { JsnesCore } from '@/emulator/cores/jsnesAdapter';
import { errorMessage } from '@/emulator/errors';
import { HostLoop } from '@/emulator/HostLoop';
import { createRetroStore } from '@/emulator/state/retroStore';
import { BrowserStorage } from '@/emulator/storage/BrowserStorage';
import { handleError } from '@/emulator/utils/errorUtils';
import FramePacer from '@/emulator/utils/FramePacer';
import { describeRom } from '@/emulator/utils/rom';
import { animationFrameDriver } from '@/emulator/utils/tickDrivers';
import { CanvasSurface } from '@/emulator/video/CanvasSurface';

function start() {
  const config = parseHostConfig(window.__RETROHOST_CONFIG__);
  if (config.sentryDsn) {
    Sentry.init({ dsn: config.sentryDsn });
  }

  const canvas = document.querySelector<HTMLCanvasElement>('canvas#screen');
  if (!canvas) throw new Error('Missing <canvas id="screen">');
  const statusEl = document.querySelector<HTMLElement>('#status');
  const romInfoEl = document.querySelector<HTMLElement>('#rom-info');

  const store = createRetroStore();

  const keyboard = new KeyboardController(window.localStorage);
  keyboard.loadKeys();
  if (config.keymap) keyboard.setKeys(config.keymap);

  const gamepads = new GamepadController(browserGamepads(), window.localStorage);
  gamepads.loadGamepadConfig();
  if (config.gamepad) gamepads.setGamepadConfig(config.gamepad);

  const speakers = new Speakers({ bufferSize: config.audio.bufferSize });
  const core = new EmulationCoreHandle(new JsnesCore(speakers.getSampleRate(), config.audio.enabled));

  const loop = new HostLoop({
    core,
    pacer: new FramePacer({ fps: config.fps, catchUpCap: config.catchUpCap }),
    input: new InputAggregator(keyboard, gamepads),
    storage: new BrowserStorage(),
    surface: new CanvasSurface(canvas, core.frameSpec),
    audio: speakers,
    store,
    onStorageEvent: (event) => {
      if (event.kind === 'load-rom' && event.status === 'applied' && romInfoEl) {
        romInfoEl.textContent = describeRom(event.info, event.name);
      }
    },
  });

  store.subscribe((state) => {
    if (!statusEl) return;
    statusEl.textContent = state.error ?? state.notice?.message ?? state.status;
  });

  document.addEventListener('keydown', keyboard.handleKeyDown);
  document.addEventListener('keyup', keyboard.handleKeyUp);
  window.addEventListener('blur', keyboard.releaseAll);
  window.addEventListener('pagehide', () => speakers.stop());

  // Pause when the tab is hidden
  document.addEventListener('visibilitychange', () => {
    if (document.hidden) {
      loop.pause();
    } else {
      loop.resume(performance.now());
    }
  });

  const actions: Record<string, () => void> = {
    'open-rom': () => loop.requestRom(),
    'save-state': () => loop.saveState(),
    'load-state': () => loop.requestSaveState(),
    reset: () => loop.reset(),
    pause: () => (loop.isPaused ? loop.resume(performance.now()) : loop.pause()),
  };

  document.querySelectorAll<HTMLElement>('[data-action]').forEach((el) => {
    el.addEventListener('click', () => {
      const action = actions[el.dataset.action ?? ''];
      if (!action) return;
      // Audio may only start after a user gesture
      if (config.audio.enabled) {
        speakers.start();
        speakers.resume();
      }
      try {
        action();
      } catch (error) {
        store.getState().setNotice({ source: 'storage', message: errorMessage(error) });
      }
    });
  });

  animationFrameDriver((now) => {
    loop.tick(now);
  }).start();
}

try {
  start();
} catch (error) {
  handleError(error);
}
