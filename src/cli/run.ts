import { StaticCatalogProvider } from '../data/provider.js'
import { loadCatalog } from '../data/catalog.js'
import { launchTUI, type TUIOptions } from '../tui/index.js'
import { AppContext } from '../tui/context.js'
import { configureLogging, createDebugLogger } from '../utils/debug.js'
import { resolveSettings, type CliOptions, type ResolveOptions } from './config.js'

const log = createDebugLogger('cli')

export interface RunDeps {
  launch?: (options: TUIOptions) => Promise<void>
  env?: ResolveOptions['env']
  cwd?: string
  homeDir?: string
}

/**
 * Resolve settings, load the catalog and hand the context to the TUI.
 * Resolves once the user has quit.
 */
export async function run(options: CliOptions, deps: RunDeps = {}): Promise<AppContext> {
  const settings = resolveSettings({ cli: options, env: deps.env, cwd: deps.cwd, homeDir: deps.homeDir })
  configureLogging({ debug: settings.debug, file: settings.logFile })
  log.debug('Resolved settings', settings)

  const catalog = loadCatalog(settings.catalogPath)
  log.info(`Loaded ${catalog.modules.length} modules from ${settings.catalogPath}`)

  const context = new AppContext({
    provider: new StaticCatalogProvider(catalog),
    startModule: settings.startModule,
    logger: log.child('tui'),
  })

  const launch = deps.launch ?? launchTUI
  await launch({ context })
  return context
}
