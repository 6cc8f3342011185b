import { Settings } from 'luxon'

// Floating times resolve in the default zone; pin it so results do not
// depend on the machine running the suite
process.env.TZ = 'UTC'
Settings.defaultZone = 'utc'
