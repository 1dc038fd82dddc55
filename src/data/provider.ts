/**
 * Read-only access to the connection catalog.
 *
 * The navigator never caches these lists: it asks again whenever an ancestor
 * selection changes, so implementations must be deterministic and free of
 * side effects for a given module/index pair.
 */

export type ConnectionStatus = 'connected' | 'disconnected' | 'connecting'

export interface ModuleDetail {
  label: string
  value: string
}

export interface ModuleInfo {
  id: string
  name: string
  description: string
  details: readonly ModuleDetail[]
}

export interface Project {
  name: string
}

export interface Environment {
  name: string
}

export interface Connection {
  name: string
  address: string
  status: ConnectionStatus
}

export interface DataProvider {
  listModules(): readonly ModuleInfo[]
  listProjects(moduleId: string): readonly Project[]
  listEnvironments(moduleId: string, projectIndex: number): readonly Environment[]
  listConnections(moduleId: string, projectIndex: number, envIndex: number): readonly Connection[]
}

/** Shape of a catalog document once validated (see catalog.ts) */
export interface CatalogDocument {
  modules: Array<
    ModuleInfo & {
      projects: Array<
        Project & {
          environments: Array<Environment & { connections: Connection[] }>
        }
      >
    }
  >
}

type CatalogModule = CatalogDocument['modules'][number]

const EMPTY: readonly never[] = Object.freeze([])

/**
 * DataProvider over an in-memory catalog document.
 * Out-of-range module ids or indices yield empty lists.
 */
export class StaticCatalogProvider implements DataProvider {
  private readonly modules: readonly ModuleInfo[]
  private readonly byId: ReadonlyMap<string, CatalogModule>

  constructor(catalog: CatalogDocument) {
    this.byId = new Map(catalog.modules.map((module) => [module.id, module]))
    this.modules = Object.freeze(
      catalog.modules.map(({ id, name, description, details }) => ({ id, name, description, details }))
    )
  }

  listModules(): readonly ModuleInfo[] {
    return this.modules
  }

  listProjects(moduleId: string): readonly Project[] {
    return this.byId.get(moduleId)?.projects ?? EMPTY
  }

  listEnvironments(moduleId: string, projectIndex: number): readonly Environment[] {
    return this.byId.get(moduleId)?.projects[projectIndex]?.environments ?? EMPTY
  }

  listConnections(moduleId: string, projectIndex: number, envIndex: number): readonly Connection[] {
    return this.byId.get(moduleId)?.projects[projectIndex]?.environments[envIndex]?.connections ?? EMPTY
  }
}
