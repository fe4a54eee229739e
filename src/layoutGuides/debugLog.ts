function readDebugFlag(): boolean {
  if (typeof window === 'undefined') return false;
  try {
    return window.localStorage?.getItem('layoutGuidesDebug') === '1';
  } catch {
    return false;
  }
}

const LAYOUT_GUIDES_DEBUG = readDebugFlag();

export function layoutGuidesLog(...args: unknown[]) {
  if (!LAYOUT_GUIDES_DEBUG) return;
  console.log('[Layout Guides]', ...args);
}
