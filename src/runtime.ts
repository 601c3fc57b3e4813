import type { Backend, Config } from "./config.js";
import type { ProcessExecutor } from "./gogcli/executor.js";
import { GogRunner } from "./gogcli/runner.js";
import { GoogleAuthProvider } from "./google/auth.js";
import { gatewayFactory } from "./google/gateway.js";
import { MapsClient } from "./google/maps.js";
import type { GatewayFactory } from "./google/types.js";
import { gogcliTools } from "./tools/gogcli.js";
import { mapsTools } from "./tools/maps.js";
import { ToolRegistry } from "./tools/registry.js";
import { workspaceTools } from "./tools/workspace.js";

export interface Runtime {
  backend: Backend;
  registry: ToolRegistry;
  /** Present for the gogcli backend. */
  gog?: GogRunner;
}

/** Seams for tests: replace the process runner, the Google gateway or fetch. */
export interface RuntimeOverrides {
  executor?: ProcessExecutor;
  gateway?: GatewayFactory;
  fetch?: typeof fetch;
}

export function authProvider(config: Config): GoogleAuthProvider {
  return new GoogleAuthProvider({
    clientId: config.google.clientId,
    clientSecret: config.google.clientSecret,
    tokenFile: config.google.tokenFile,
    accountsDir: config.google.accountsDir,
  });
}

export function buildRuntime(config: Config, overrides: RuntimeOverrides = {}): Runtime {
  const registry = new ToolRegistry();
  let gog: GogRunner | undefined;

  if (config.backend === "gogcli") {
    gog = new GogRunner({
      bin: config.gogcli.bin,
      defaultAccount: config.gogcli.account,
      timeoutSeconds: config.gogcli.timeoutSeconds,
      passphraseMode: config.gogcli.passphraseMode,
      passphrasePrompt: config.gogcli.passphrasePrompt,
      expectBin: config.gogcli.expectBin,
      executor: overrides.executor,
    });
    registry.add(...gogcliTools(gog));
  } else {
    const gateway = overrides.gateway ?? gatewayFactory(authProvider(config));
    registry.add(...workspaceTools(gateway, { exportDir: config.google.exportDir }));
  }

  if (config.mapsApiKey) {
    registry.add(...mapsTools(new MapsClient({ apiKey: config.mapsApiKey, fetch: overrides.fetch })));
  }

  return { backend: config.backend, registry, gog };
}
