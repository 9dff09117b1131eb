import { BaseError } from "@cellar/errors"
import { PinoLogger } from "../pino-logger"
import { createLineDestination } from "./pino-harness"

describe("PinoLogger behavior", () => {
  it("emits JSON lines with message, bound context and meta", () => {
    const { lines, destination } = createLineDestination()

    const logger = new PinoLogger(
      { destination },
      { level: "trace" },
      { service: "billing" },
    )

    logger.info("secrets loaded", { secretId: "app/prod", keys: 3 })

    expect(lines).toHaveLength(1)
    expect(lines[0]).toMatchObject({
      level: 30,
      msg: "secrets loaded",
      service: "billing",
      secretId: "app/prod",
      keys: 3,
    })
    expect(typeof lines[0]?.time).toBe("number")
  })

  it("defaults to info when no level is given", () => {
    const { lines, destination } = createLineDestination()

    const logger = new PinoLogger({ destination })

    logger.debug("ignored")
    logger.info("kept")

    expect(lines.map((l) => l.msg)).toEqual(["kept"])
  })

  it("serializes err with its cause chain", () => {
    const { lines, destination } = createLineDestination()

    const logger = new PinoLogger({ destination }, { level: "trace" })
    const cause = new Error("socket hang up")

    logger.error("request failed", {
      err: new BaseError("failure to send request", { code: "request_failure", cause }),
    })

    expect(lines[0]?.err).toMatchObject({
      type: "BaseError",
      message: "failure to send request",
      code: "request_failure",
      cause: { type: "Error", message: "socket hang up" },
    })
  })

  it("child() shares the parent's destination and level", () => {
    const { lines, destination } = createLineDestination()

    const base = new PinoLogger({ destination }, { level: "warn" }, { service: "billing" })
    const child = base.child({ secretId: "app/prod" })

    child.info("ignored")
    child.warn("logged")

    expect(lines).toHaveLength(1)
    expect(lines[0]).toMatchObject({
      msg: "logged",
      service: "billing",
      secretId: "app/prod",
    })
  })
})
