export { parseEnv } from "./parse-env.js";
export { formatZodErrors, parseOrThrow } from "./zod-helpers.js";
export { isMainModule } from "./is-main.js";
