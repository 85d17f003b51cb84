import { existsSync, readFileSync } from "node:fs";
import { createHash } from "node:crypto";
import path from "node:path";
import { parse as parseYaml } from "yaml";
import type { Logger } from "../logger";
import { policyDocumentSchema } from "./schema";
import type { PolicyDocument, PolicyInfo } from "./types";

export type PolicySnapshot = {
  policy: PolicyDocument | null;
  info: PolicyInfo;
  source: "loaded" | "last-good" | "fallback";
  error?: string;
};

export type PolicyLoader = {
  getSnapshot: () => PolicySnapshot;
  reload: () => PolicySnapshot;
};

function resolvePolicyRoot(): string {
  const roots = [
    process.cwd(),
    path.resolve(process.cwd(), ".."),
    path.resolve(process.cwd(), "..", "..")
  ];

  for (const candidate of roots) {
    const policyDir = path.resolve(candidate, "policies");
    if (existsSync(policyDir)) {
      return policyDir;
    }
  }

  return path.resolve(process.cwd(), "policies");
}

export function defaultPolicyPath(): string {
  return path.resolve(resolvePolicyRoot(), "guardrails.v1.yaml");
}

function hashPolicy(raw: string): string {
  return createHash("sha256").update(raw).digest("hex");
}

export function parsePolicyDocument(raw: string): PolicyDocument {
  return policyDocumentSchema.parse(parseYaml(raw));
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function createPolicyLoader(options?: {
  path?: string;
  logger?: Logger;
  handleSignals?: boolean;
  now?: () => Date;
}): PolicyLoader {
  const policyPath = options?.path ? path.resolve(options.path) : defaultPolicyPath();
  const now = options?.now ?? (() => new Date());
  let lastGood: PolicySnapshot | null = null;
  let current: PolicySnapshot | null = null;

  const load = (): PolicySnapshot => {
    try {
      const raw = readFileSync(policyPath, "utf-8");
      const policy = parsePolicyDocument(raw);
      const snapshot: PolicySnapshot = {
        policy,
        info: { version: policy.version, hash: hashPolicy(raw), loadedAt: now().toISOString(), path: policyPath },
        source: "loaded"
      };
      lastGood = snapshot;
      current = snapshot;
      options?.logger?.info({ path: policyPath, hash: snapshot.info.hash }, "Policy document loaded");
      return snapshot;
    } catch (error) {
      const message = describeError(error);
      options?.logger?.error({ path: policyPath, error: message }, "Failed to load policy document");
      if (lastGood) {
        current = { ...lastGood, source: "last-good", error: message };
        return current;
      }
      current = {
        policy: null,
        info: { version: "v1", hash: "unavailable", loadedAt: now().toISOString(), path: policyPath },
        source: "fallback",
        error: message
      };
      return current;
    }
  };

  load();

  if (options?.handleSignals ?? false) {
    process.on("SIGHUP", () => {
      load();
    });
  }

  return {
    getSnapshot: () => current ?? load(),
    reload: () => load()
  };
}

/** Loader over an in-memory document; no file, no reload. */
export function createStaticPolicyLoader(policy: PolicyDocument, info?: Partial<PolicyInfo>): PolicyLoader {
  const snapshot: PolicySnapshot = {
    policy,
    info: {
      version: policy.version,
      hash: info?.hash ?? "static",
      loadedAt: info?.loadedAt ?? "static",
      path: info?.path ?? "inline"
    },
    source: "loaded"
  };
  return {
    getSnapshot: () => snapshot,
    reload: () => snapshot
  };
}
