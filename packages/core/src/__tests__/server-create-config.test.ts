import { parseRunList, validateServerCreateOptions, type ServerCreateOptions } from "../server-create-config";
import { ConfigurationError } from "../errors";

const validOptions = (overrides: Partial<ServerCreateOptions> = {}): ServerCreateOptions => ({
  availabilityDomain: "us-east-1a",
  imageId: "ami-0abc",
  shape: "t3.small",
  subnetId: "subnet-123",
  identityFile: "~/.ssh/id_test",
  sshAuthorizedKeysFile: "~/.ssh/id_test.pub",
  ...overrides,
});

describe("validateServerCreateOptions", () => {
  it("applies defaults", () => {
    const config = validateServerCreateOptions(validOptions());

    expect(config.ssh.user).toBe("opc");
    expect(config.ssh.gateway).toBeUndefined();
    expect(config.usePrivateIp).toBe(false);
    expect(config.runList).toEqual([]);
    expect(config.waitToStabilizeSeconds).toBe(40);
    expect(config.waitForSshMaxSeconds).toBe(300);
    expect(config.yes).toBe(false);
  });

  it("lists every missing required option", () => {
    expect(() =>
      validateServerCreateOptions({ availabilityDomain: "us-east-1a", subnetId: "subnet-123" })
    ).toThrow(
      "Missing the following required parameters: image-id, shape, identity-file, ssh-authorized-keys-file"
    );
  });

  it("treats blank required options as missing", () => {
    expect(() => validateServerCreateOptions(validOptions({ shape: "  " }))).toThrow(
      "Missing the following required parameters: shape"
    );
  });

  it("rejects a negative wait before anything else runs", () => {
    expect(() => validateServerCreateOptions(validOptions({ waitForSshMax: "-1" }))).toThrow(ConfigurationError);
  });

  it("rejects a non-numeric stabilize wait", () => {
    expect(() => validateServerCreateOptions(validOptions({ waitToStabilize: "abc" }))).toThrow(
      "--wait-to-stabilize must be numeric"
    );
  });

  it("accepts a zero SSH wait", () => {
    expect(validateServerCreateOptions(validOptions({ waitForSshMax: "0" })).waitForSshMaxSeconds).toBe(0);
  });

  it("parses the gateway address", () => {
    const config = validateServerCreateOptions(validOptions({ sshGateway: "ops@bastion:2222" }));

    expect(config.ssh.gateway).toEqual({ host: "bastion", user: "ops", port: 2222, portSpecified: true });
  });

  it("splits the run list", () => {
    const config = validateServerCreateOptions(validOptions({ runList: "role[base], recipe[nginx]" }));

    expect(config.runList).toEqual(["role[base]", "recipe[nginx]"]);
  });
});

describe("parseRunList", () => {
  it("splits on commas and whitespace", () => {
    expect(parseRunList("a,b c")).toEqual(["a", "b", "c"]);
  });

  it("flattens list input", () => {
    expect(parseRunList(["a,b", "c"])).toEqual(["a", "b", "c"]);
  });

  it("returns an empty list for blank input", () => {
    expect(parseRunList("")).toEqual([]);
  });
});
