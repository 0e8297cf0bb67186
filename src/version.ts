import * as packageJson from "../package.json";

export const THEORY_VERSION = packageJson.version;
