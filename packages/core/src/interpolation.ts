import { ConfigurationError } from "@stockroom/errors";

type Env = Readonly<Record<string, string | undefined>>;

// `$${...}` is an escaped literal; `${NAME}` and `${NAME:fallback}` expand.
const TOKEN = /\$(?<escaped>\$)?\{(?<name>[^}:]+)(?::(?<fallback>[^}]*))?\}/g;

/**
 * Expand `${NAME}` and `${NAME:fallback}` in configuration text from `env`.
 *
 * An empty variable counts as set. `$${NAME}` yields the literal `${NAME}`.
 * Expanded values are not expanded again.
 *
 * @throws {ConfigurationError} naming every variable that is unset and has no fallback
 */
export function interpolateEnvVars(text: string, env: Env = process.env): string {
  const missing = new Set<string>();

  const expanded = text.replace(TOKEN, (token: string, ...rest: unknown[]) => {
    const groups = rest.at(-1);
    const escaped = readGroup(groups, "escaped");
    const name = readGroup(groups, "name") ?? "";
    if (escaped !== undefined) return token.slice(1);

    const fallback = readGroup(groups, "fallback");
    const value = env[name.trim()] ?? fallback;
    if (value === undefined) missing.add(name.trim());
    return value ?? "";
  });

  if (missing.size > 0) {
    throw new ConfigurationError([...missing].map((name) => `\${${name}}: environment variable is not set`));
  }
  return expanded;
}

function readGroup(groups: unknown, key: string): string | undefined {
  if (typeof groups !== "object" || groups === null) return undefined;
  const value: unknown = Reflect.get(groups, key);
  return typeof value === "string" ? value : undefined;
}
