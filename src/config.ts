/**
 * Configuration from environment variables
 * CLI flags override these defaults
 */

export function getEnvNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (value === undefined) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

export function getEnvString(key: string, defaultValue: string): string {
  return process.env[key] ?? defaultValue;
}

export function getEnvBoolean(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (value === undefined) return defaultValue;
  return value.toLowerCase() === "true" || value === "1";
}

export function loadConfig() {
  return {
    /**
     * Log level: debug, info, warn, error, silent
     * @env UAC_LOG_LEVEL
     * @default "warn"
     */
    LOG_LEVEL: getEnvString("UAC_LOG_LEVEL", "warn"),

    /**
     * Default output format
     * @env UAC_FORMAT
     * @default "full"
     */
    FORMAT: getEnvString("UAC_FORMAT", "full"),

    /**
     * Width of the ASCII topology diagram
     * @env UAC_RENDER_WIDTH
     * @default 80
     */
    RENDER_WIDTH: getEnvNumber("UAC_RENDER_WIDTH", 80),

    /**
     * lsusb executable used with --device
     * @env UAC_LSUSB_PATH
     * @default "lsusb"
     */
    LSUSB_PATH: getEnvString("UAC_LSUSB_PATH", "lsusb"),

    /**
     * lsusb timeout in milliseconds
     * @env UAC_LSUSB_TIMEOUT
     * @default 5000
     */
    LSUSB_TIMEOUT: getEnvNumber("UAC_LSUSB_TIMEOUT", 5000),

    /**
     * Suppress warnings on stderr
     * @env UAC_QUIET
     * @default false
     */
    QUIET: getEnvBoolean("UAC_QUIET", false),
  };
}

export type Config = ReturnType<typeof loadConfig>;

export const config: Config = loadConfig();

/**
 * Print the effective configuration
 */
export function printConfig(
  current: Config = config,
  write: (line: string) => void = console.log
): void {
  write("UAC Analyzer Configuration:");
  write(`  Log Level:      ${current.LOG_LEVEL}`);
  write(`  Format:         ${current.FORMAT}`);
  write(`  Render Width:   ${current.RENDER_WIDTH}`);
  write(`  lsusb Path:     ${current.LSUSB_PATH}`);
  write(`  lsusb Timeout:  ${current.LSUSB_TIMEOUT}ms`);
  write(`  Quiet:          ${current.QUIET}`);
}
