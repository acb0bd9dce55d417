/**
 * Load .env before config/logger read process.env.
 * Must be the first import in index.ts.
 */
import 'dotenv/config'
import path from 'path'
import fs from 'fs'
import dotenv from 'dotenv'

// Project root .env (one level above server/) fills in anything the local .env left unset
const rootEnv = path.join(process.cwd(), '..', '.env')
if (fs.existsSync(rootEnv)) {
  dotenv.config({ path: rootEnv, override: false })
}
