/**
 * Version Command
 *
 * Displays version information.
 */

import * as os from "node:os";
import { BUILD_DATE, VERSION } from "../version.js";

export function version(): void {
  console.log(`
vidshift ${VERSION}

Build Date:   ${BUILD_DATE}
Platform:     ${os.platform()}-${os.arch()}
Node Version: ${process.version}
`);
}
