/**
 * Package Boundary Enforcement Test
 *
 * Verifies that shared/src/ stays free of runtime infrastructure by scanning for disallowed imports.
 *
 * FORBIDDEN patterns:
 * - Azure SDK imports (@azure/*)
 * - Paths into the sync package
 * - Direct environment variable reads (process.env.X)
 * - Application Insights telemetry calls
 * - Network or XML parsing libraries (the sync package owns the wire)
 */

import assert from 'node:assert/strict'
import { readdir, readFile } from 'node:fs/promises'
import { join } from 'node:path'
import { test } from 'node:test'
import { fileURLToPath } from 'node:url'
import { z } from 'zod'

/** Forbidden import patterns that violate domain purity */
const FORBIDDEN_PATTERNS = [
    // Azure SDKs
    /@azure\/cosmos/,
    /@azure\/keyvault/,
    /@azure\/identity/,

    // Sync package paths
    /from ['"]\.\.\/\.\.\/sync\//,
    /from ['"]@touchline\/sync/,

    // Direct secret access (should use abstractions)
    /process\.env\./,
    /SecretClient/,

    // Application Insights direct usage
    /applicationinsights/,
    /trackEvent\(/,
    /trackTrace\(/,

    // Wire concerns
    /fast-xml-parser/,
    /\bfetch\(/
]

/** Allowed exception patterns (legitimate uses that look similar to violations) */
const ALLOWED_EXCEPTIONS = [
    // Type-only imports are fine (no runtime dependency)
    /import type .* from ['"]@azure/,
    // Comments/docs
    /^\s*(\/\/|\*|\/\*)/
]

const PackageJsonSchema = z.object({
    dependencies: z.record(z.string()).optional(),
    exports: z.record(z.union([z.string(), z.record(z.string())])).optional()
})

const packageRoot = fileURLToPath(new URL('..', import.meta.url))

async function readPackageJson(): Promise<z.infer<typeof PackageJsonSchema>> {
    const raw: unknown = JSON.parse(await readFile(join(packageRoot, 'package.json'), 'utf-8'))
    return PackageJsonSchema.parse(raw)
}

async function scanDirectory(dir: string): Promise<string[]> {
    const files: string[] = []
    const entries = await readdir(dir, { withFileTypes: true })

    for (const entry of entries) {
        const fullPath = join(dir, entry.name)
        if (entry.isDirectory()) {
            files.push(...(await scanDirectory(fullPath)))
        } else if (entry.name.endsWith('.ts') && !entry.name.endsWith('.d.ts')) {
            files.push(fullPath)
        }
    }

    return files
}

function checkFileForViolations(content: string, filePath: string): string[] {
    const violations: string[] = []
    const lines = content.split('\n')

    lines.forEach((line, index) => {
        if (ALLOWED_EXCEPTIONS.some((pattern) => pattern.test(line))) {
            return
        }

        for (const pattern of FORBIDDEN_PATTERNS) {
            if (pattern.test(line)) {
                violations.push(`${filePath}:${index + 1} - Forbidden pattern: ${pattern.source}\n  ${line.trim()}`)
            }
        }
    })

    return violations
}

test('shared/src maintains domain purity (no infrastructure imports)', async () => {
    const files = await scanDirectory(join(packageRoot, 'src'))

    assert.ok(files.length > 0, 'Should find TypeScript files to scan')

    const allViolations: string[] = []

    for (const file of files) {
        const content = await readFile(file, 'utf-8')
        allViolations.push(...checkFileForViolations(content, file))
    }

    if (allViolations.length > 0) {
        assert.fail(['Package boundary violations detected:', '', ...allViolations].join('\n'))
    }
})

test('package.json has no Azure SDK runtime dependencies', async () => {
    const pkgJson = await readPackageJson()

    const azureDeps = Object.keys(pkgJson.dependencies ?? {}).filter((dep) => dep.startsWith('@azure/'))

    assert.deepStrictEqual(azureDeps, [], `Found Azure SDK dependencies (should be zero): ${azureDeps.join(', ')}`)
})

test('exports resolve to the TypeScript sources', async () => {
    const pkgJson = await readPackageJson()

    for (const [key, value] of Object.entries(pkgJson.exports ?? {})) {
        const paths = typeof value === 'string' ? [value] : Object.values(value)
        for (const path of paths) {
            assert.match(path, /^\.\/src\/.*\.ts$/, `Export "${key}" should point to ./src/, got: ${path}`)
        }
    }
})
