import { existsSync, readFileSync } from "node:fs";
import { join, resolve } from "node:path";

function parse_line(line: string): { key: string; value: string } | null {
  const trimmed = line.trim();
  if (!trimmed || trimmed.startsWith("#")) return null;
  const body = trimmed.startsWith("export ") ? trimmed.slice("export ".length) : trimmed;
  const eq = body.indexOf("=");
  if (eq <= 0) return null;
  const key = body.slice(0, eq).trim();
  let value = body.slice(eq + 1).trim();
  if (
    (value.startsWith('"') && value.endsWith('"')) ||
    (value.startsWith("'") && value.endsWith("'"))
  ) {
    value = value.slice(1, -1);
  }
  return { key, value };
}

/** 파일 내용을 env에 반영. 셸에서 이미 지정한 키는 덮어쓰지 않는다. */
function load_one(path: string, env: NodeJS.ProcessEnv, protected_keys: Set<string>): number {
  if (!existsSync(path)) return 0;
  const raw = readFileSync(path, "utf-8");
  let loaded = 0;
  for (const line of raw.split(/\r?\n/)) {
    const parsed = parse_line(line);
    if (!parsed || protected_keys.has(parsed.key)) continue;
    env[parsed.key] = parsed.value;
    loaded += 1;
  }
  return loaded;
}

/** cwd의 .env, .env.local 순서로 로드. 뒤 파일이 앞 파일 값을 덮어쓴다. */
export function load_env_files(
  cwd: string,
  env: NodeJS.ProcessEnv = process.env,
): { loaded: number; files: string[] } {
  const base = resolve(cwd);
  const protected_keys = new Set(Object.keys(env));
  let loaded = 0;
  const files: string[] = [];
  for (const path of [join(base, ".env"), join(base, ".env.local")]) {
    const n = load_one(path, env, protected_keys);
    if (n > 0) {
      loaded += n;
      files.push(path);
    }
  }
  return { loaded, files };
}
