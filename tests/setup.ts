/**
 * Test Setup
 *
 * Quiet, isolated environment for every test file.
 */

import * as os from "os";
import * as path from "path";

process.env.NODE_ENV = "test";
process.env.LOG_LEVEL = "error"; // Suppress logs during tests
process.env.LOG_DIR = path.join(os.tmpdir(), "paperslides-test-logs");
