import { describe, expect, it } from "vitest";
import { InputError } from "../../src/router/errors.ts";
import { validateEndpoint } from "../../src/server/endpoint.ts";

describe("validateEndpoint", () => {
  it("should accept http and https endpoints unchanged", () => {
    expect(validateEndpoint("http://localhost:8323")).toBe("http://localhost:8323");
    expect(validateEndpoint("https://rpki.example.net/rp")).toBe("https://rpki.example.net/rp");
  });

  it("should trim whitespace and trailing slashes", () => {
    expect(validateEndpoint("  http://localhost:8323/  ")).toBe("http://localhost:8323");
    expect(validateEndpoint("https://rpki.example.net/rp//")).toBe("https://rpki.example.net/rp");
  });

  it("should leave a bare scheme intact", () => {
    expect(validateEndpoint("https://")).toBe("https://");
  });

  it("should reject an empty endpoint", () => {
    expect(() => validateEndpoint("   ")).toThrow(new InputError("Upstream endpoint is required"));
  });

  it("should reject other schemes", () => {
    expect(() => validateEndpoint("ftp://rpki.example.net")).toThrow(
      'Upstream endpoint must start with http:// or https:// (got "ftp://rpki.example.net")',
    );
    expect(() => validateEndpoint("localhost:8323")).toThrow(InputError);
  });
});
