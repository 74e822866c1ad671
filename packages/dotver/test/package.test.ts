import { readFileSync } from 'node:fs'
import { describe, expect, it } from 'vitest'

interface Manifest {
  exports: Record<string, { types: string, import: string }>
  types: string
  files: string[]
}

function readManifest(): Manifest {
  return JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf8'))
}

describe('Package manifest', () => {
  it('should point entry points at the published build output', () => {
    const manifest = readManifest()
    expect(manifest.files).toEqual(['dist'])
    expect(manifest.types).toBe('./dist/src/index.d.ts')
    expect(manifest.exports['.']).toEqual({
      types: './dist/src/index.d.ts',
      import: './dist/src/index.js',
    })
  })
})
