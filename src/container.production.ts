/**
 * Production container, backed by Supabase.
 * Logs to Axiom when AXIOM_API_KEY and AXIOM_DATASET are set, otherwise to
 * the console.
 */

import { loadConfig } from './config.js';
import { createContainer, type Container } from './container.js';
import { getSupabaseClient } from './db.js';
import { AxiomLogProvider } from './providers/AxiomLogProvider.js';
import { ConsoleLogProvider } from './providers/ConsoleLogProvider.js';
import type { ILogProvider } from './providers/ILogProvider.js';
import { SupabasePortfolioRepository } from './repositories/SupabasePortfolioRepository.js';

let cached: Container | null = null;

export function getProductionContainer(
  env: Record<string, string | undefined> = process.env
): Container {
  if (cached) return cached;

  const config = loadConfig(env);
  const db = getSupabaseClient(env);

  cached = createContainer({
    repository: new SupabasePortfolioRepository(db),
    logProvider: createLogProvider(env),
    config,
  });

  return cached;
}

function createLogProvider(env: Record<string, string | undefined>): ILogProvider {
  const apiToken = env.AXIOM_API_KEY;
  const dataset = env.AXIOM_DATASET;
  if (apiToken && dataset) {
    return new AxiomLogProvider({ apiToken, dataset });
  }
  return new ConsoleLogProvider({ outputToConsole: true });
}
