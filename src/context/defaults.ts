import { loadSettings } from "../config/settings.js";
import { Context } from "./index.js";
import { fromEnv } from "./sources.js";

/**
 * Process-wide fallback Context, built once at module load from the variables
 * under `STEPLINE_ENV_PREFIX` (default `STEPLINE__`; `STEPLINE__DB__HOST` → `db.host`).
 * Steps and Tasks constructed without a Context are bound to it. Like every
 * Context it is frozen; derive from it with merge() or withOverrides().
 */
export const defaultContext: Context = Context.from(fromEnv(process.env, { prefix: loadSettings().envPrefix }));
