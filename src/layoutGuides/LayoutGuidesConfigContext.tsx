import { createContext, ReactNode, useContext, useMemo } from 'react';

import { resolveLayoutGuidesConfig, type LayoutGuidesConfig } from './config';

const LayoutGuidesConfigContext = createContext<LayoutGuidesConfig | null>(null);

let defaultConfig: LayoutGuidesConfig | null = null;

function getDefaultConfig(): LayoutGuidesConfig {
  if (!defaultConfig) defaultConfig = resolveLayoutGuidesConfig();
  return defaultConfig;
}

/**
 * Overrides the measurement settings for every measuring component below.
 * Unset fields inherit from the enclosing provider (or the defaults).
 */
export function LayoutGuidesConfigProvider({
  config,
  children
}: {
  config: Partial<LayoutGuidesConfig>;
  children: ReactNode;
}) {
  const parent = useContext(LayoutGuidesConfigContext);
  // Keyed on the fields, not on `config`: an inline object must not rebuild the provider
  // (and restart every session below) on each render.
  const {
    settleIntervalMs,
    fallbackMaxWidth,
    readableContentMaxWidth,
    defaultLayoutMargin,
    updateBaselineOnSuppressed,
    guideProvider
  } = config;
  const resolved = useMemo(() => {
    const base = parent ?? getDefaultConfig();
    // A different readable width needs a provider built for it, unless one is given explicitly.
    const inheritsProvider = guideProvider === undefined && readableContentMaxWidth === undefined;
    return resolveLayoutGuidesConfig({
      settleIntervalMs: settleIntervalMs ?? base.settleIntervalMs,
      fallbackMaxWidth: fallbackMaxWidth ?? base.fallbackMaxWidth,
      readableContentMaxWidth: readableContentMaxWidth ?? base.readableContentMaxWidth,
      defaultLayoutMargin: defaultLayoutMargin ?? base.defaultLayoutMargin,
      updateBaselineOnSuppressed: updateBaselineOnSuppressed ?? base.updateBaselineOnSuppressed,
      guideProvider: guideProvider ?? (inheritsProvider ? base.guideProvider : undefined)
    });
  }, [
    parent,
    settleIntervalMs,
    fallbackMaxWidth,
    readableContentMaxWidth,
    defaultLayoutMargin,
    updateBaselineOnSuppressed,
    guideProvider
  ]);

  return <LayoutGuidesConfigContext.Provider value={resolved}>{children}</LayoutGuidesConfigContext.Provider>;
}

export function useLayoutGuidesConfig(): LayoutGuidesConfig {
  return useContext(LayoutGuidesConfigContext) ?? getDefaultConfig();
}
