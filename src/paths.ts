import os from "os";
import path from "path";

export function expandHome(inputPath: string, homeDir: string = os.homedir()): string {
  if (inputPath === "~") {
    return homeDir;
  }
  if (inputPath.startsWith("~/")) {
    return path.join(homeDir, inputPath.slice(2));
  }
  return inputPath;
}

export function expandEnv(inputPath: string, env: NodeJS.ProcessEnv): string {
  return inputPath.replace(
    /\$\{([A-Z0-9_]+)(:-([^}]*))?\}/gi,
    (
      _match: string,
      varName: string,
      _fallbackGroup: string | undefined,
      fallback: string | undefined
    ): string => {
      const value = env[varName];
      if (value && value.length > 0) {
        return value;
      }
      return fallback ?? "";
    }
  );
}

export function resolvePath(inputPath: string, env: NodeJS.ProcessEnv, homeDir?: string): string {
  return path.resolve(expandHome(expandEnv(inputPath, env), homeDir));
}

export function resolveFromRoot(root: string, relativePath: string): string {
  if (path.isAbsolute(relativePath)) {
    return path.resolve(relativePath);
  }
  return path.resolve(root, relativePath);
}

/** True when `candidate` is `root` itself or lies below it. */
export function isWithin(root: string, candidate: string): boolean {
  const relative = path.relative(root, candidate);
  if (relative === "") {
    return true;
  }
  if (relative === ".." || relative.startsWith(`..${path.sep}`)) {
    return false;
  }
  return !path.isAbsolute(relative);
}
