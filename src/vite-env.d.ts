/// <reference types="vite/client" />

// Host configuration injected by the page embedding the browser build
declare global {
  interface Window {
    __RETROHOST_CONFIG__?: unknown;
  }
}

export {};
