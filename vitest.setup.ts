/**
 * Vitest Global Setup
 *
 * Resets the config cache around every test so vi.stubEnv() calls are
 * picked up by the config module on next access.
 */

import { beforeAll, beforeEach } from "vitest";
import { _resetConfigCache } from "./src/config/index.js";

beforeAll(() => {
  _resetConfigCache();
});

beforeEach(() => {
  _resetConfigCache();
});
