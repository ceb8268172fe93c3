import { readFile, writeFile, mkdir } from 'node:fs/promises'
import { dirname } from 'node:path'

interface FSX {
  readonly readText: (path: string) => Promise<string | null>
  readonly readJson: (path: string) => Promise<unknown>
  readonly writeJson: (path: string, data: unknown) => Promise<void>
}

async function readText(path: string): Promise<string | null> {
  try { return (await readFile(path, 'utf8')).replace(/^\uFEFF/, '') } catch { return null }
}

/** Returns `undefined` when the file is missing; throws on malformed JSON. */
async function readJson(path: string): Promise<unknown> {
  const buf: string | null = await readText(path)
  if (buf === null) return undefined
  const parsed: unknown = JSON.parse(buf)
  return parsed
}

async function writeJson(path: string, data: unknown): Promise<void> {
  await mkdir(dirname(path), { recursive: true })
  await writeFile(path, JSON.stringify(data, null, 2) + '\n', 'utf8')
}

export const fsx: FSX = { readText, readJson, writeJson }
