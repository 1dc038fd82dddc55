import { StaticCatalogProvider, type CatalogDocument } from '../data/provider.js'
import { AppContext } from './context.js'
import type { KeyPress } from './types.js'

type ModuleFixture = CatalogDocument['modules'][number]
type ProjectFixture = ModuleFixture['projects'][number]

/**
 * Project fixture with one environment per entry in `connectionCounts`,
 * each holding that many disconnected connections.
 */
export function project(name: string, connectionCounts: number[]): ProjectFixture {
  return {
    name,
    environments: connectionCounts.map((count, e) => ({
      name: `${name}-env-${e}`,
      connections: Array.from({ length: count }, (_, c) => ({
        name: `${name}-conn-${e}-${c}`,
        address: `10.0.${e}.${c}:1000`,
        status: 'disconnected' as const,
      })),
    })),
  }
}

export function moduleFixture(id: string, name: string, projects: ProjectFixture[]): ModuleFixture {
  return { id, name, description: `${name} settings`, details: [{ label: 'Host', value: 'localhost' }], projects }
}

/**
 * Four modules; MySQL (index 1) has three projects and its last project has a
 * single environment with three connections. Redis ends with a project that
 * has no environments.
 */
export function createTestCatalog(): CatalogDocument {
  return {
    modules: [
      moduleFixture('ssh', 'SSH', [project('infra', [2, 1])]),
      moduleFixture('mysql', 'MySQL', [
        project('storefront', [1, 1]),
        project('billing', [2]),
        project('analytics', [3]),
      ]),
      moduleFixture('postgresql', 'PostgreSQL', [project('platform', [1, 0])]),
      moduleFixture('redis', 'Redis', [project('caching', [2]), project('archive', [])]),
    ],
  }
}

export function createTestProvider(catalog: CatalogDocument = createTestCatalog()): StaticCatalogProvider {
  return new StaticCatalogProvider(catalog)
}

export function createTestContext(startModule?: string, catalog?: CatalogDocument): AppContext {
  return new AppContext({ provider: createTestProvider(catalog), startModule })
}

export function key(name: string, modifiers: Partial<Omit<KeyPress, 'name'>> = {}): KeyPress {
  return { name, ctrl: false, shift: false, ...modifiers }
}
