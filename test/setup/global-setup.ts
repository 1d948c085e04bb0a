/**
 * Global test setup
 *
 * Environment for apps built in tests: no persistence, no remote services
 * configured, quiet logs.
 */

export async function setup(): Promise<void> {
  process.env.NODE_ENV = 'test'
  process.env.logLevel = 'silent'
  process.env.port = '3004'
  process.env.enableConsoleOutput = 'false'
  process.env.persistEnabled = 'false'
  process.env.statePath = '/nonexistent/listening-sync/state.json'
  process.env.absBaseUrl = ''
  process.env.absToken = ''
  process.env.audibleAuthJsonB64 = ''
  process.env.audibleAuthPath = '/nonexistent/listening-sync/audible-auth.json'
}
