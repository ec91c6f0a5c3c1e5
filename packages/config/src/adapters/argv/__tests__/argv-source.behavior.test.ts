import { StaticInvocation } from "../static/static-invocation"
import { ArgvSource } from "../argv-source"

describe("ArgvSource behavior", () => {
  const invocation = new StaticInvocation({
    subcommand: { name: "serve", invocation: new StaticInvocation({ values: { port: "8080" } }) },
  })

  it("is named argv unless told otherwise", () => {
    expect(new ArgvSource({ invocation }).name).toBe("argv")
    expect(new ArgvSource({ invocation, name: "argv:serve" }).name).toBe("argv:serve")
  })

  it("passes subcommandField to the tree", async () => {
    const source = new ArgvSource({ invocation, subcommandField: "command" })

    expect(await source.load()).toEqual({ serve: { port: "8080" }, command: "serve" })
  })

  it("hands out a tree the caller may modify", async () => {
    const loaded = await new ArgvSource({ invocation }).load()

    expect(Object.isFrozen(loaded)).toBe(false)
    expect(Object.isFrozen(loaded.serve)).toBe(false)
  })
})
