import * as fs from 'fs'
import * as path from 'path'
import { fileURLToPath } from 'url'
import { parse as parseYaml } from 'yaml'
import { z } from 'zod'
import type { CatalogDocument } from './provider.js'

export class CatalogError extends Error {
  constructor(
    message: string,
    public readonly source: string
  ) {
    super(message)
    this.name = 'CatalogError'
  }
}

const ConnectionSchema = z.object({
  name: z.string().min(1),
  address: z.string().min(1),
  status: z.enum(['connected', 'disconnected', 'connecting']).default('disconnected'),
})

const EnvironmentSchema = z.object({
  name: z.string().min(1),
  connections: z.array(ConnectionSchema).default([]),
})

const ProjectSchema = z.object({
  name: z.string().min(1),
  environments: z.array(EnvironmentSchema).default([]),
})

const ModuleSchema = z.object({
  id: z.string().regex(/^[a-z0-9-]+$/, 'module id must be lowercase letters, digits or dashes'),
  name: z.string().min(1),
  description: z.string().default(''),
  details: z.array(z.object({ label: z.string(), value: z.string() })).default([]),
  projects: z.array(ProjectSchema).default([]),
})

export const CatalogSchema = z
  .object({
    modules: z.array(ModuleSchema).min(1, 'catalog must define at least one module'),
  })
  .superRefine((catalog, ctx) => {
    const seen = new Set<string>()
    catalog.modules.forEach((module, index) => {
      if (seen.has(module.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['modules', index, 'id'],
          message: `duplicate module id '${module.id}'`,
        })
      }
      seen.add(module.id)
    })
  })

/**
 * Path of the catalog shipped with the package.
 * src/data and dist/data sit at the same depth, so one relative URL serves both.
 */
export function defaultCatalogPath(): string {
  return fileURLToPath(new URL('../../catalog/default.json', import.meta.url))
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `  - ${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('\n')
}

/**
 * Validate an already-parsed catalog value
 */
export function parseCatalog(raw: unknown, source: string): CatalogDocument {
  const result = CatalogSchema.safeParse(raw)
  if (!result.success) {
    throw new CatalogError(`Invalid catalog in ${source}:\n${formatIssues(result.error)}`, source)
  }
  return result.data
}

/**
 * Load and validate a catalog file. `.yaml`/`.yml` files are parsed as YAML,
 * everything else as JSON.
 */
export function loadCatalog(catalogPath: string = defaultCatalogPath()): CatalogDocument {
  if (!fs.existsSync(catalogPath)) {
    throw new CatalogError(`Catalog file not found: ${catalogPath}`, catalogPath)
  }

  const content = fs.readFileSync(catalogPath, 'utf-8')
  const ext = path.extname(catalogPath)
  let raw: unknown
  try {
    raw = ext === '.yaml' || ext === '.yml' ? parseYaml(content) : JSON.parse(content)
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    throw new CatalogError(`Failed to parse catalog file: ${catalogPath}\nReason: ${message}`, catalogPath)
  }

  return parseCatalog(raw, catalogPath)
}
