import type { Command } from "../../ports/command"
import type { InterceptedClient, InterceptorBeforeContext } from "../../ports/interceptor"

export class BeforeContext implements InterceptorBeforeContext {
  private assigned = false
  private substitute: unknown = undefined

  constructor(
    readonly client: InterceptedClient,
    readonly command: Command,
  ) {}

  get value(): unknown {
    return this.substitute
  }

  set value(value: unknown) {
    this.substitute = value
    this.assigned = true
  }

  get isValueChanged(): boolean {
    return this.assigned
  }
}
