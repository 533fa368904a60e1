/**
 * Environment context for detecting dev/prod/CI status.
 */
export interface EnvContext {
  NODE_ENV?: string | undefined;
  CI?: string | undefined;
}

/**
 * Environment utilities returned by createEnvUtilities.
 */
export interface EnvUtilities {
  /** Development or test mode */
  isDev: boolean;
  /** Local development only (not CI, not production) - for using mocks */
  isLocalDev: boolean;
  isProduction: boolean;
  isCI: boolean;
  /** Production requires real third-party credentials */
  requiresRealServices: boolean;
}

/**
 * Create environment utilities from runtime env vars.
 * This is the single source of truth for dev/prod/CI detection.
 *
 * @example
 * ```typescript
 * const { isLocalDev } = createEnvUtilities(c.env);
 * if (isLocalDev) { return createMockPlacesClient(); }
 * ```
 */
export function createEnvUtilities(env: EnvContext): EnvUtilities {
  const nodeEnv = env.NODE_ENV ?? 'development';
  const isCI = Boolean(env.CI);
  // 'test' mode is treated as development (uses mocks, not production services)
  const isDevMode = nodeEnv === 'development' || nodeEnv === 'test';

  return {
    isDev: isDevMode,
    isLocalDev: isDevMode && !isCI,
    isProduction: nodeEnv === 'production',
    isCI,
    requiresRealServices: nodeEnv === 'production',
  };
}
