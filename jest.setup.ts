import '@testing-library/jest-dom';

// JSDOM has no ResizeObserver; the DOM guide provider needs one to be considered available.
// Keep it minimal (and no-op): tests drive geometry through fake providers or their own observer stub.
if (typeof globalThis.ResizeObserver === 'undefined') {
  class ResizeObserver {
    observe() {
      /* no-op */
    }
    unobserve() {
      /* no-op */
    }
    disconnect() {
      /* no-op */
    }
  }
  globalThis.ResizeObserver = ResizeObserver;
}
