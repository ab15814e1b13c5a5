// backend/services/hypepipe/scripts/mintDevToken.ts
/**
 * Mint a HypePipe caller token with the configured secret (ops-only, NOT an
 * endpoint). Prints the token to stdout.
 *
 * Usage:
 *   tsx backend/services/hypepipe/scripts/mintDevToken.ts \
 *     --agent edgenavigator-v1 \
 *     --scopes read:core.asset.snapshot,read:macro.regime \
 *     --tier readonly --ttl 3600 --policy v1
 *
 * Secret: HYPEPIPE_JWT_SECRET, else HYPEPIPE_JWT_SECRET_FILE
 * (default <repo root>/.hypepipe_jwt_secret).
 */

import { parseArgs } from "node:util";
import { getEnv, requireEnum, requireNumber } from "../../shared/src/env";
import { TIERS } from "../src/auth/claims";
import { signDevToken } from "../src/auth/devToken";
import { EnvFileSecretSource, requireSecret } from "../src/auth/secret";

function main(): void {
  const { values } = parseArgs({
    options: {
      agent: { type: "string" },
      scopes: { type: "string", default: "" },
      tier: { type: "string", default: "readonly" },
      ttl: { type: "string", default: "3600" },
      policy: { type: "string" },
    },
  });

  const agentId = (values.agent ?? "").trim();
  if (!agentId) throw new Error("--agent is required");

  const secret = requireSecret(
    new EnvFileSecretSource(process.env, getEnv("HYPEPIPE_JWT_SECRET_FILE"))
  );

  const token = signDevToken(
    {
      agentId,
      scopes: (values.scopes ?? "")
        .split(",")
        .map((s) => s.trim())
        .filter(Boolean),
      tier: requireEnum("--tier", values.tier ?? "readonly", TIERS),
      ttlS: requireNumber("--ttl", values.ttl ?? "3600"),
      policyVersion: values.policy,
    },
    secret
  );

  process.stdout.write(`${token}\n`);
}

try {
  main();
} catch (err) {
  // eslint-disable-next-line no-console
  console.error(`[mintDevToken] ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
}
