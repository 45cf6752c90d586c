/**
 * ResourceManager - named cleanup registry for live input subscriptions.
 * Cleanups run in registration order; a throwing cleanup never prevents the rest from running.
 */

export interface CleanupFailure {
  identifier: string
  error: unknown
}

export class ResourceManager {
  private cleanups = new Map<string, () => void>()

  register(identifier: string, cleanup: () => void): () => void {
    if (this.cleanups.has(identifier)) {
      throw new Error(`Resource with identifier "${identifier}" already exists`)
    }
    this.cleanups.set(identifier, cleanup)

    return () => {
      if (this.cleanups.get(identifier) === cleanup) {
        this.cleanups.delete(identifier)
      }
    }
  }

  release(identifier: string): CleanupFailure | null {
    const cleanup = this.cleanups.get(identifier)
    if (!cleanup) return null

    this.cleanups.delete(identifier)
    try {
      cleanup()
      return null
    } catch (error) {
      return { identifier, error }
    }
  }

  releaseAll(): CleanupFailure[] {
    const failures: CleanupFailure[] = []
    for (const identifier of Array.from(this.cleanups.keys())) {
      const failure = this.release(identifier)
      if (failure) failures.push(failure)
    }
    return failures
  }

  hasResource(identifier: string): boolean {
    return this.cleanups.has(identifier)
  }

  getResourceCount(): number {
    return this.cleanups.size
  }

  getIdentifiers(): string[] {
    return Array.from(this.cleanups.keys())
  }
}
