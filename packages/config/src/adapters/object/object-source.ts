import type { ConfigSource } from "../../ports/source"

/**
 * In-code values, typically test or CLI overrides applied last.
 */
export class ObjectSource implements ConfigSource {
  readonly name: string

  constructor(
    private readonly obj: Record<string, unknown>,
    name = "overrides",
  ) {
    this.name = `object:${name}`
  }

  async load(): Promise<Record<string, unknown>> {
    return { ...this.obj }
  }
}
