import { describe, test, expect } from "vitest";
import { ConfigError } from "#/errors";
import { getRegistryDisplayName, isSameRegistry, parseRegistryRef, registryKey } from "./resolver";

describe("parseRegistryRef", () => {
  test("parses a bare ACR name", () => {
    expect(parseRegistryRef("contoso01")).toEqual({ kind: "acr", name: "contoso01" });
  });

  test("strips the azurecr.io suffix", () => {
    expect(parseRegistryRef("contoso01.azurecr.io")).toEqual({ kind: "acr", name: "contoso01" });
    expect(parseRegistryRef(" Contoso01.AzureCR.io ")).toEqual({ kind: "acr", name: "Contoso01" });
  });

  test("keeps the subscription", () => {
    expect(parseRegistryRef("contoso01", "sub-1")).toEqual({ kind: "acr", name: "contoso01", subscription: "sub-1" });
  });

  test("parses OCI hosts", () => {
    expect(parseRegistryRef("oci:ghcr.io")).toEqual({ kind: "oci", host: "ghcr.io" });
    expect(parseRegistryRef("oci://registry.local:5000/")).toEqual({ kind: "oci", host: "registry.local:5000" });
  });

  test.each([["ab"], ["has-dash"], ["contoso/01"], [""]])("rejects invalid ACR name %j", (value) => {
    expect(() => parseRegistryRef(value)).toThrow(ConfigError);
  });

  test("rejects an invalid OCI host", () => {
    expect(() => parseRegistryRef("oci:bad host")).toThrow("Invalid OCI registry host 'bad host'");
  });

  test("rejects a subscription on an OCI registry", () => {
    expect(() => parseRegistryRef("oci:ghcr.io", "sub-1")).toThrow(ConfigError);
  });
});

describe("registryKey / isSameRegistry", () => {
  test("ACR names compare case-insensitively, ignoring subscription", () => {
    expect(registryKey({ kind: "acr", name: "Contoso01", subscription: "a" })).toBe("acr:contoso01");
    expect(isSameRegistry({ kind: "acr", name: "contoso01" }, { kind: "acr", name: "CONTOSO01", subscription: "b" })).toBe(
      true
    );
  });

  test("ACR and OCI never match", () => {
    expect(isSameRegistry({ kind: "acr", name: "contoso01" }, { kind: "oci", host: "contoso01.azurecr.io" })).toBe(false);
  });
});

describe("getRegistryDisplayName", () => {
  test("shows ACR names bare and OCI hosts prefixed", () => {
    expect(getRegistryDisplayName({ kind: "acr", name: "contoso01" })).toBe("contoso01");
    expect(getRegistryDisplayName({ kind: "oci", host: "ghcr.io" })).toBe("oci:ghcr.io");
  });
});
