// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Vitest global setup.
 *
 * Points TERMSAGE_HOME at a throwaway directory so no test reads or writes the
 * real global configuration.
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

process.env.TERMSAGE_HOME = fs.mkdtempSync(path.join(os.tmpdir(), 'termsage-home-'));
