/**
 * Version of the running bob build
 */

import packageJson from "../../package.json";

/**
 * @returns The version string from package.json, or null if it has none
 */
export const getCurrentPackageVersion = (): string | null => {
  const { version } = packageJson;
  return typeof version === "string" && version.length > 0 ? version : null;
};
