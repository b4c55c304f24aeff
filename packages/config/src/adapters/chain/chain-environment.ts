import type { EnvLookupResult, Environment } from "../../ports/environment"

/**
 * Layers several environments. Later environments override earlier ones, so
 * `[defaultsFile, envFile, new ProcessEnvironment()]` lets real variables win
 * over files.
 */
export class ChainEnvironment implements Environment {
  readonly name: string
  private readonly layers: readonly Environment[]

  constructor(layers: readonly Environment[]) {
    this.layers = [...layers]
    this.name = `chain(${this.layers.map((l) => l.name).join(",")})`
  }

  lookup(key: string): EnvLookupResult {
    for (let i = this.layers.length - 1; i >= 0; i--) {
      const result = this.layers[i]?.lookup(key)
      if (result?.kind === "found") return result
    }

    return { kind: "not_found" }
  }

  /**
   * Name of the environment that supplies `key`, or undefined when none does.
   */
  explain(key: string): string | undefined {
    for (let i = this.layers.length - 1; i >= 0; i--) {
      const layer = this.layers[i]
      if (layer?.lookup(key).kind === "found") return layer.name
    }

    return undefined
  }
}
