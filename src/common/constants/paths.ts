import { homedir } from "os";
import { join } from "path";

const VELLUM_DIR_NAME = ".vellum";

/**
 * Get the root directory for all Vellum store files.
 * Can be overridden with the VELLUM_STORE_DIR env var (tests, portable installs).
 * Appends '-dev' suffix when NODE_ENV=development (explicit dev mode).
 *
 * This is a getter function to support test mocking of os.homedir().
 */
export function getVellumHome(): string {
  if (process.env.VELLUM_STORE_DIR) {
    return process.env.VELLUM_STORE_DIR;
  }

  // Use -dev suffix only when explicitly in development mode
  const suffix = process.env.NODE_ENV === "development" ? "-dev" : "";
  return join(homedir(), VELLUM_DIR_NAME + suffix);
}
