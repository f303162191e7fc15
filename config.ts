/**
 * Root configuration for the jurisdiction registry
 *
 * Registry-wide defaults apply to every jurisdiction that does not set its
 * own value. Each can be overridden from the environment (.env is loaded by
 * the CLI).
 */

import path from 'path'
import { fileURLToPath } from 'url'

// Project root in source, dist/ once built (the build copies the data there)
const __dirname = path.dirname(fileURLToPath(import.meta.url))

interface RegistryConfig {
  /** Directory holding the catalog files (one JSON list per country) */
  data_dir: string;
  /** IANA timezone for jurisdictions without a TIMEZONE */
  default_timezone: string;
  /** OCD division for jurisdictions without a division_id */
  default_division_id: string;
}

interface Config {
  registry: RegistryConfig;
}

const config: Config = {
  registry: {
    data_dir: process.env.LEGISTAR_DATA_DIR || path.join(__dirname, 'packages/jurisdictions/data'),

    default_timezone: process.env.LEGISTAR_DEFAULT_TIMEZONE || 'America/New_York',

    default_division_id: process.env.LEGISTAR_DEFAULT_DIVISION_ID || 'ocd-division/country:us',
  }
}

export default config
