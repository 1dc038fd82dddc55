import * as fs from 'fs'
import * as os from 'os'
import * as path from 'path'
import { afterEach, beforeEach, describe, test, expect } from 'vitest'
import { CatalogError, defaultCatalogPath, loadCatalog, parseCatalog } from './catalog.js'

describe('data/catalog', () => {
  let tempDir: string

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'linkdeck-catalog-'))
  })

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true })
  })

  test('the bundled catalog defines the four modules', () => {
    const catalog = loadCatalog(defaultCatalogPath())
    expect(catalog.modules.map((module) => module.id)).toEqual(['ssh', 'mysql', 'postgresql', 'redis'])
    expect(catalog.modules[1]?.projects.map((project) => project.name)).toEqual(['storefront', 'billing', 'analytics'])
  })

  test('fills in defaults for optional fields', () => {
    const catalog = parseCatalog(
      {
        modules: [
          {
            id: 'ssh',
            name: 'SSH',
            projects: [{ name: 'infra', environments: [{ name: 'prod', connections: [{ name: 'a', address: 'host:22' }] }] }],
          },
          { id: 'redis', name: 'Redis' },
        ],
      },
      'inline'
    )
    expect(catalog.modules[0]?.description).toBe('')
    expect(catalog.modules[0]?.details).toEqual([])
    expect(catalog.modules[0]?.projects[0]?.environments[0]?.connections[0]?.status).toBe('disconnected')
    expect(catalog.modules[1]?.projects).toEqual([])
  })

  test('rejects duplicate module ids', () => {
    const raw = { modules: [{ id: 'ssh', name: 'SSH' }, { id: 'ssh', name: 'Shell' }] }
    expect(() => parseCatalog(raw, 'inline')).toThrow(
      "Invalid catalog in inline:\n  - modules.1.id: duplicate module id 'ssh'"
    )
  })

  test('rejects module ids outside the key alphabet', () => {
    const raw = { modules: [{ id: 'My SQL', name: 'MySQL' }] }
    expect(() => parseCatalog(raw, 'inline')).toThrow(
      'modules.0.id: module id must be lowercase letters, digits or dashes'
    )
  })

  test('rejects an empty module list', () => {
    expect(() => parseCatalog({ modules: [] }, 'inline')).toThrow(
      'modules: catalog must define at least one module'
    )
  })

  test('loads YAML catalogs', () => {
    const file = path.join(tempDir, 'catalog.yaml')
    fs.writeFileSync(
      file,
      [
        'modules:',
        '  - id: mongo',
        '    name: MongoDB',
        '    projects:',
        '      - name: app',
        '        environments:',
        '          - name: dev',
        '            connections:',
        '              - name: mongo-dev',
        '                address: localhost:27017',
        '                status: connecting',
        '',
      ].join('\n')
    )
    const catalog = loadCatalog(file)
    expect(catalog.modules[0]?.name).toBe('MongoDB')
    expect(catalog.modules[0]?.projects[0]?.environments[0]?.connections[0]).toEqual({
      name: 'mongo-dev',
      address: 'localhost:27017',
      status: 'connecting',
    })
  })

  test('reports a missing file', () => {
    const file = path.join(tempDir, 'missing.json')
    expect(() => loadCatalog(file)).toThrow(CatalogError)
    expect(() => loadCatalog(file)).toThrow(`Catalog file not found: ${file}`)
  })

  test('reports unparseable JSON', () => {
    const file = path.join(tempDir, 'broken.json')
    fs.writeFileSync(file, '{ "modules": [')
    expect(() => loadCatalog(file)).toThrow(`Failed to parse catalog file: ${file}\nReason:`)
  })

  test('carries the source path on the error', () => {
    const file = path.join(tempDir, 'invalid.json')
    fs.writeFileSync(file, JSON.stringify({ modules: 'nope' }))
    try {
      loadCatalog(file)
      expect.unreachable()
    } catch (error) {
      expect(error).toBeInstanceOf(CatalogError)
      expect(error instanceof CatalogError ? error.source : null).toBe(file)
    }
  })
})
