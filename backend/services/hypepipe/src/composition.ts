// backend/services/hypepipe/src/composition.ts
/**
 * Purpose:
 * - Composition root: wire config → concrete collaborators → gateway.
 *
 * Notes:
 * - Every seam can be overridden (tests pass a fake db, fixed clock, static
 *   secret, fake fear & greed fetcher). Nothing here touches the network.
 */

import { PgDbClient } from "../../shared/src/db/PgDbClient";
import type { SchemaGate } from "../../shared/src/db/SchemaGate";
import type { IDbClient } from "../../shared/src/db/types";
import type { EnvSource } from "../../shared/src/env";
import { systemClock, type Clock } from "../../shared/src/utils/clock";
import { PgSnapshotStore } from "../../market/src/snapshots/PgSnapshotStore";
import type { ISnapshotStore } from "../../market/src/snapshots/types";
import {
  axiosFearGreedFetcher,
  FearGreedService,
  type FearGreedFetcher,
} from "../../market/src/views/fearGreed";
import { PgAuditSink } from "./audit/PgAuditSink";
import type { IAuditSink } from "./audit/types";
import { EnvFileSecretSource, type ISecretSource } from "./auth/secret";
import { TokenVerifier } from "./auth/TokenVerifier";
import { ResultCache } from "./cache/ResultCache";
import { createCapabilityRegistry } from "./capabilities/registry";
import type { ICapabilityRegistry } from "./capabilities/types";
import type { HypepipeConfig } from "./config";
import { CapabilityGateway } from "./gateway/CapabilityGateway";

export type HypepipeOverrides = {
  env?: EnvSource;
  clock?: Clock;
  db?: IDbClient;
  schemaGate?: SchemaGate;
  snapshots?: ISnapshotStore;
  secret?: ISecretSource;
  fearGreedFetcher?: FearGreedFetcher;
};

export type Hypepipe = {
  config: HypepipeConfig;
  clock: Clock;
  db: IDbClient;
  secret: ISecretSource;
  audit: IAuditSink;
  cache: ResultCache;
  registry: ICapabilityRegistry;
  gateway: CapabilityGateway;
};

export function buildHypepipe(
  config: HypepipeConfig,
  o: HypepipeOverrides = {}
): Hypepipe {
  const env = o.env ?? process.env;
  const clock = o.clock ?? systemClock;
  const db = o.db ?? new PgDbClient(config.db);
  const secret = o.secret ?? new EnvFileSecretSource(env, config.jwtSecretFile);
  const snapshots = o.snapshots ?? new PgSnapshotStore(db);

  const fearGreed = new FearGreedService(
    snapshots,
    o.fearGreedFetcher ?? axiosFearGreedFetcher(config.fearGreedUrl),
    clock
  );

  const audit = new PgAuditSink(db, o.schemaGate);
  const cache = new ResultCache(clock);
  const registry = createCapabilityRegistry({ snapshots, fearGreed, clock });
  const verifier = new TokenVerifier(secret, clock);

  const gateway = new CapabilityGateway({
    verifier,
    registry,
    cache,
    audit,
    clock,
    env,
  });

  return { config, clock, db, secret, audit, cache, registry, gateway };
}
