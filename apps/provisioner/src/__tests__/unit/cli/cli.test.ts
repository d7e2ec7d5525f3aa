import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from "vitest";
import { createCLI } from "../../../cli.js";
import { testConfig } from "../../helpers/fixtures.js";

describe("wls-provision CLI", () => {
  let output: MockInstance<typeof console.log>;

  beforeEach(() => {
    output = vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    output.mockRestore();
  });

  function printed(): string[] {
    return output.mock.calls.map((args) => String(args[0]));
  }

  it("should register every command", () => {
    const names = createCLI(testConfig()).commands.map((command) => command.name());
    expect(names).toEqual(["create-domain", "provision-jms", "wait-ready", "plan"]);
  });

  it("should print the numbered JMS plan", async () => {
    await createCLI(testConfig({ JMS_DISTRIBUTED_QUEUE_MEMBERS: "ms1@udd_queue" })).parseAsync(["plan", "jms"], {
      from: "user",
    });

    expect(printed()).toEqual([
      "1. start edit session",
      "2. create JMS server TestJMSServer unless one exists",
      "3. create JMS module TestJMSModule with sub-deployment TestJMSSubdeployment",
      "4. create connection factory TestConnectionFactory (jms/TestConnectionFactory)",
      "5. create queue TestQueue (jms/TestQueue)",
      "6. create distributed queue udd_queue (jms/udd_queue, Round-Robin)",
      "7. create queue ms1@udd_queue (jms/ms1@udd_queue)",
      "8. add ms1@udd_queue to udd_queue",
      "9. save and activate changes",
      "10. disconnect",
    ]);
  });

  it("should print the domain plan as JSON", async () => {
    await createCLI(testConfig()).parseAsync(["plan", "domain", "--json"], { from: "user" });

    const steps: unknown = JSON.parse(printed()[0]);
    expect(Array.isArray(steps)).toBe(true);
    expect(steps).toContainEqual({ op: "writeDomain", path: "/u01/oracle/user_projects/domains/base_domain" });
  });

  it("should print the WLST script on a create-domain dry run", async () => {
    await createCLI(testConfig({ DOMAIN_NAME: "orders" })).parseAsync(["create-domain", "--dry-run"], {
      from: "user",
    });

    const script = printed()[0];
    expect(script.split("\n")[3]).toBe("selectTemplate('Basic WebLogic Server Domain')");
    expect(script).toContain("writeDomain('/u01/oracle/user_projects/domains/orders')");
  });

  it("should print the JMS steps on a provision-jms dry run", async () => {
    await createCLI(testConfig()).parseAsync(["provision-jms", "--dry-run"], { from: "user" });

    expect(printed()).toHaveLength(12);
    expect(printed()[11]).toBe("12. disconnect");
  });
});
