/**
 * TokenManager Unit Tests
 */

import { VendorConfigurationService } from "../../../src/application/configuration/VendorConfigurationService"
import { TokenManager } from "../../../src/infrastructure/authority/TokenManager"
import { AuthenticationError, ConfigurationError } from "../../../src/shared/errors"
import { on, stubFetch, tokenXml, xmlResponse } from "../../helpers/fetchStub"
import { InMemoryVendorConfigurationRepository, vendorConfiguration } from "../../helpers/inMemoryRepositories"

const NOW = new Date("2026-05-01T00:00:00Z")

describe("TokenManager", () => {
  function tokenEndpoint(body: string = tokenXml("new-token"), status: number = 200) {
    return stubFetch(on("/integration/vendor_authenticate", () => xmlResponse(body, status)))
  }

  describe("configuration errors", () => {
    it("should fail when no configuration exists", async () => {
      const { fetchFn } = tokenEndpoint()
      const manager = new TokenManager(new InMemoryVendorConfigurationRepository(null), { fetchFn })

      await expect(manager.getValidToken()).rejects.toThrow(
        "No POS Vendor Configuration found. Create one with base URL, client ID and client secret."
      )
      expect(fetchFn).not.toHaveBeenCalled()
    })

    it("should name the disabled flag", async () => {
      const { fetchFn } = tokenEndpoint()
      const repository = new InMemoryVendorConfigurationRepository(vendorConfiguration({ disabled: true }))
      const manager = new TokenManager(repository, { fetchFn })

      const error = await manager.getValidToken().catch((e: unknown) => e)

      expect(error).toBeInstanceOf(ConfigurationError)
      expect(error).toMatchObject({ field: "disabled", statusCode: 500 })
    })

    it("should name the missing client secret", async () => {
      const { fetchFn } = tokenEndpoint()
      const repository = new InMemoryVendorConfigurationRepository(vendorConfiguration({ clientSecret: null }))
      const manager = new TokenManager(repository, { fetchFn })

      await expect(manager.getValidToken()).rejects.toMatchObject({
        message: "Client secret is not configured on the POS Vendor Configuration",
        field: "clientSecret",
      })
    })

    it("should fall back to the default base URL", async () => {
      const { fetchFn, calls } = tokenEndpoint()
      const repository = new InMemoryVendorConfigurationRepository(vendorConfiguration({ baseUrl: null }))
      const manager = new TokenManager(repository, {
        fetchFn,
        defaultBaseUrl: "https://fallback.test/",
        now: () => NOW,
      })

      const session = await manager.getSession()

      expect(session.baseUrl).toBe("https://fallback.test")
      expect(calls[0]?.url).toBe("https://fallback.test/integration/vendor_authenticate")
    })
  })

  describe("getValidToken", () => {
    it("should return the stored token while it is valid", async () => {
      const { fetchFn } = tokenEndpoint()
      const repository = new InMemoryVendorConfigurationRepository(
        vendorConfiguration({ accessToken: "stored-token", tokenExpiresAt: new Date("2026-05-01T01:00:00Z") })
      )
      const manager = new TokenManager(repository, { fetchFn, now: () => NOW })

      await expect(manager.getValidToken()).resolves.toBe("stored-token")
      expect(fetchFn).not.toHaveBeenCalled()
    })

    it("should refresh an expired token with basic authentication", async () => {
      const { fetchFn, calls } = tokenEndpoint()
      const repository = new InMemoryVendorConfigurationRepository(
        vendorConfiguration({ accessToken: "old-token", tokenExpiresAt: new Date("2026-04-30T00:00:00Z") })
      )
      const manager = new TokenManager(repository, { fetchFn, now: () => NOW })

      await expect(manager.getValidToken()).resolves.toBe("new-token")

      expect(calls).toHaveLength(1)
      expect(calls[0]?.method).toBe("POST")
      expect(calls[0]?.url).toBe("https://authority.test/integration/vendor_authenticate")
      expect(calls[0]?.headers.get("Authorization")).toBe(
        `Basic ${Buffer.from("test-client:test-secret").toString("base64")}`
      )
      expect(repository.savedTokens).toEqual([
        { accessToken: "new-token", tokenExpiresAt: new Date(2099, 0, 1, 0, 0, 0), companyId: "C1" },
      ])
    })

    it("should refresh a token that expires inside the buffer", async () => {
      const { fetchFn } = tokenEndpoint()
      const repository = new InMemoryVendorConfigurationRepository(
        vendorConfiguration({ accessToken: "stored-token", tokenExpiresAt: new Date(NOW.getTime() + 30_000) })
      )
      const manager = new TokenManager(repository, { fetchFn, now: () => NOW, expiryBufferSeconds: 60 })

      await expect(manager.getValidToken()).resolves.toBe("new-token")
    })

    it("should refresh when forced", async () => {
      const { fetchFn } = tokenEndpoint()
      const repository = new InMemoryVendorConfigurationRepository(
        vendorConfiguration({ accessToken: "stored-token", tokenExpiresAt: new Date("2099-01-01T00:00:00Z") })
      )
      const manager = new TokenManager(repository, { fetchFn, now: () => NOW })

      await expect(manager.getValidToken(true)).resolves.toBe("new-token")
    })

    it("should refresh on next use when the authority returns a past expiry", async () => {
      const { fetchFn } = stubFetch(
        on("/integration/vendor_authenticate", () => xmlResponse(tokenXml(`token-${fetchFn.mock.calls.length}`, "2020-01-01 00:00:00")))
      )
      const repository = new InMemoryVendorConfigurationRepository(vendorConfiguration())
      const manager = new TokenManager(repository, { fetchFn, now: () => NOW })

      await expect(manager.getValidToken()).resolves.toBe("token-1")
      await expect(manager.getValidToken()).resolves.toBe("token-2")
      expect(fetchFn).toHaveBeenCalledTimes(2)
    })

    it("should reuse the refreshed token without another call", async () => {
      const { fetchFn } = tokenEndpoint()
      const manager = new TokenManager(new InMemoryVendorConfigurationRepository(vendorConfiguration()), {
        fetchFn,
        now: () => NOW,
      })

      await manager.getValidToken()
      await manager.getValidToken()

      expect(fetchFn).toHaveBeenCalledTimes(1)
    })

    it("should apply a configuration saved through another instance on the next call", async () => {
      const { fetchFn } = tokenEndpoint()
      const repository = new InMemoryVendorConfigurationRepository(
        vendorConfiguration({ accessToken: "stored-token", tokenExpiresAt: new Date("2099-01-01T00:00:00Z") })
      )
      const running = new TokenManager(repository, { fetchFn, now: () => NOW })
      const configurationService = new VendorConfigurationService(
        repository,
        new TokenManager(repository, { fetchFn, now: () => NOW })
      )

      await expect(running.getValidToken()).resolves.toBe("stored-token")

      await configurationService.saveConfiguration({ disabled: true })

      await expect(running.getValidToken()).rejects.toThrow("POS Vendor Configuration is disabled")
      expect(fetchFn).not.toHaveBeenCalled()
    })
  })

  describe("authentication failures", () => {
    it("should report rejected credentials", async () => {
      const { fetchFn } = tokenEndpoint("<error>denied</error>", 401)
      const manager = new TokenManager(new InMemoryVendorConfigurationRepository(vendorConfiguration()), { fetchFn })

      await expect(manager.getValidToken()).rejects.toThrow(
        "Failed to authenticate vendor: the tax authority rejected the client ID or client secret"
      )
    })

    it("should reject a response without access_token", async () => {
      const body = "<response><company_id>C1</company_id></response>"
      const { fetchFn } = tokenEndpoint(body)
      const repository = new InMemoryVendorConfigurationRepository(vendorConfiguration())
      const manager = new TokenManager(repository, { fetchFn })

      const error = await manager.getValidToken().catch((e: unknown) => e)

      expect(error).toBeInstanceOf(AuthenticationError)
      expect(error).toMatchObject({ message: `No access_token found in response: ${body}`, responseBody: body })
      expect(repository.savedTokens).toEqual([])
    })

    it("should wrap network failures", async () => {
      const fetchFn = jest.fn(async (): Promise<Response> => {
        throw new Error("connect ECONNREFUSED")
      })
      const manager = new TokenManager(new InMemoryVendorConfigurationRepository(vendorConfiguration()), { fetchFn })

      await expect(manager.getValidToken()).rejects.toThrow("Failed to authenticate vendor: connect ECONNREFUSED")
    })
  })
})
