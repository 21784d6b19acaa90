import * as fs from 'fs'
import { tmpdir } from 'os'
import { join } from 'path'

/**
 * Creates a private temporary directory per test file and removes it afterwards.
 * Tests point the store at paths below it, so nothing outside is ever touched.
 */
export class TempDirHelper {
  private tempRoot: string = ''

  constructor(private name: string = 'temp') {}

  setup(): void {
    this.tempRoot = fs.mkdtempSync(join(tmpdir(), `prefstore-${this.name}-`))
  }

  get root(): string {
    if (this.tempRoot.length === 0) throw new Error('TempDirHelper.setup() was not called')
    return this.tempRoot
  }

  path(...segments: string[]): string {
    return join(this.root, ...segments)
  }

  cleanup(): void {
    if (this.tempRoot.length > 0 && fs.existsSync(this.tempRoot)) {
      fs.rmSync(this.tempRoot, { recursive: true, force: true })
    }
    this.tempRoot = ''
  }
}
