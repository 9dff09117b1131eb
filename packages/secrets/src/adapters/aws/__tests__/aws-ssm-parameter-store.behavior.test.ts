import { GetParameterCommand } from "@aws-sdk/client-ssm"
import { type MockProxy, mock } from "vitest-mock-extended"
import { AwsSsmParameterStore, type SsmParameterReader } from "../aws-ssm-parameter-store"

describe("AwsSsmParameterStore (behavior)", () => {
  let client: MockProxy<SsmParameterReader>
  let store: AwsSsmParameterStore

  beforeEach(() => {
    client = mock<SsmParameterReader>()
    store = new AwsSsmParameterStore({ client })
  })

  it("is named aws-ssm", () => {
    expect(store.name).toBe("aws-ssm")
  })

  it("returns the parameter value", async () => {
    client.send.mockResolvedValue({
      $metadata: {},
      Parameter: { Name: "/billing/prod/secrets", Value: '{"db-pass":"s3cr3t"}' },
    })

    await expect(store.fetchSecretString("/billing/prod/secrets")).resolves.toBe(
      '{"db-pass":"s3cr3t"}',
    )
  })

  it("requests decryption", async () => {
    client.send.mockResolvedValue({ $metadata: {}, Parameter: { Value: "{}" } })

    await store.fetchSecretString("/billing/prod/secrets")

    expect(client.send).toHaveBeenCalledTimes(1)
    const [command] = client.send.mock.calls[0] ?? []
    expect(command).toBeInstanceOf(GetParameterCommand)
    expect(command?.input).toEqual({ Name: "/billing/prod/secrets", WithDecryption: true })
  })

  it.each([
    ["no parameter", { $metadata: {} }],
    ["no value", { $metadata: {}, Parameter: { Name: "/billing/prod/secrets" } }],
  ])("returns null for %s", async (_label, response) => {
    client.send.mockResolvedValue(response)

    await expect(store.fetchSecretString("/billing/prod/secrets")).resolves.toBeNull()
  })

  it("wraps client failures", async () => {
    const cause = new Error("ParameterNotFound")
    client.send.mockRejectedValue(cause)

    await expect(store.fetchSecretString("/billing/prod/secrets")).rejects.toMatchObject({
      message: "Failed to get parameter: /billing/prod/secrets",
      cause,
    })
  })
})
