// Environment Configuration Loader
// .env holds the base configuration, .env.local overrides it on a single machine

import { config } from 'dotenv'

config()
config({ path: '.env.local', override: true })
