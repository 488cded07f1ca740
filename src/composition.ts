/**
 * Composition Root
 *
 * This is the single place where the default adapters are wired together.
 * Front ends (the CLI, the library entry point) open engines through here;
 * tests build a ReplaceEngine directly with fakes.
 */

import type { FileSystem, GlobCompiler, Logger } from "./domain/ports";
import { ReplaceEngine, type EngineOptions } from "./app/engine";
import { ReplaceSession } from "./app/session";
import { nodeFileSystem } from "./infrastructure/filesystem";
import { compileMinimatchGlob } from "./infrastructure/glob";
import { createSilentLogger } from "./infrastructure/logger";

// ============================================================================
// Service Container
// ============================================================================

/**
 * Adapters shared by every engine a process opens.
 */
export interface ServiceContainer {
  fileSystem: FileSystem;
  compileGlob: GlobCompiler;
  logger: Logger;
}

export function createServiceContainer(
  overrides: Partial<ServiceContainer> = {}
): ServiceContainer {
  return {
    fileSystem: overrides.fileSystem ?? nodeFileSystem,
    compileGlob: overrides.compileGlob ?? compileMinimatchGlob,
    logger: overrides.logger ?? createSilentLogger(),
  };
}

// ============================================================================
// Factories
// ============================================================================

/**
 * Load config for `rootDir`, create an engine over it and build its index.
 */
export async function createReplaceEngine(
  rootDir: string,
  options: EngineOptions = {},
  container: ServiceContainer = createServiceContainer({ logger: options.logger })
): Promise<ReplaceEngine> {
  const engine = await ReplaceEngine.create(rootDir, {
    ...options,
    fileSystem: options.fileSystem ?? container.fileSystem,
    compileGlob: options.compileGlob ?? container.compileGlob,
    logger: options.logger ?? container.logger,
  });
  await engine.buildIndex();
  return engine;
}

/**
 * Engine plus a session seeded from its config.
 */
export async function createReplaceSession(
  rootDir: string,
  options: EngineOptions = {}
): Promise<{ engine: ReplaceEngine; session: ReplaceSession }> {
  const engine = await createReplaceEngine(rootDir, options);
  return { engine, session: new ReplaceSession(engine) };
}
