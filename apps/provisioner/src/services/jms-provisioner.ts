import type { Config } from "../config.js";
import { resolveCredentials } from "../credentials.js";
import { buildMessagingPlan, describeStep, messagingPlanInput } from "../domain/messaging/plan.js";
import type { MessagingStep, StepOutcome, StepReport } from "../domain/messaging/types.js";
import { AdminRestClient, type FetchFn } from "../http/admin-client.js";
import { RestEditSession, type EditSession } from "../http/edit-session.js";
import { createTimer, log, logFailure } from "../logger.js";
import { waitForAdminServer } from "./admin-readiness.js";

// =============================================================================
// Bean tree locations and references
// =============================================================================

const JMS_SERVERS = ["JMSServers"] as const;
const JMS_SYSTEM_RESOURCES = ["JMSSystemResources"] as const;

function jmsResource(module: string, collection: string): string[] {
  return ["JMSSystemResources", module, "JMSResource", collection];
}

function serverTarget(server: string) {
  return { identity: ["servers", server] };
}

function jmsServerTarget(jmsServer: string) {
  return { identity: ["JMSServers", jmsServer] };
}

// =============================================================================
// Plan execution
// =============================================================================

/**
 * Apply a messaging plan step by step.
 *
 * The first failing call propagates as-is: later steps are never attempted
 * and nothing already created is rolled back.
 */
export async function applyMessagingPlan(
  session: EditSession,
  plan: MessagingStep[]
): Promise<StepReport[]> {
  const report: StepReport[] = [];
  let adminServer: string | undefined;

  const resolveAdminServer = async (): Promise<string> => {
    adminServer ??= await session.adminServerName();
    return adminServer;
  };

  for (const [index, step] of plan.entries()) {
    try {
      const outcome = await applyStep(session, step, resolveAdminServer);
      report.push({ step, outcome });
      log.jms.info({ step: index + 1, of: plan.length, op: step.op, outcome }, describeStep(step));
    } catch (error) {
      logFailure("jms", "step failed", error, { step: index + 1, op: step.op });
      throw error;
    }
  }

  return report;
}

async function applyStep(
  session: EditSession,
  step: MessagingStep,
  adminServer: () => Promise<string>
): Promise<StepOutcome> {
  switch (step.op) {
    case "startEdit":
      await session.startEdit();
      return "done";

    case "ensureJmsServer": {
      const existing = await session.list(JMS_SERVERS);
      if (existing.length > 0) {
        log.jms.info({ existing }, "JMS server already present, not creating another");
        return "skipped";
      }
      await session.create(JMS_SERVERS, { name: step.name, targets: [serverTarget(await adminServer())] });
      return "created";
    }

    case "createJmsModule": {
      await session.create(JMS_SYSTEM_RESOURCES, {
        name: step.name,
        targets: [serverTarget(await adminServer())],
      });
      const jmsServers = await session.list(JMS_SERVERS);
      await session.create(["JMSSystemResources", step.name, "subDeployments"], {
        name: step.subDeployment,
        targets: jmsServers.map(jmsServerTarget),
      });
      return "created";
    }

    case "createConnectionFactory":
      await session.create(jmsResource(step.module, "connectionFactories"), {
        name: step.name,
        JNDIName: step.jndiName,
        subDeploymentName: step.subDeployment,
      });
      return "created";

    case "createQueue":
      await session.create(jmsResource(step.module, "queues"), {
        name: step.name,
        JNDIName: step.jndiName,
        subDeploymentName: step.subDeployment,
      });
      return "created";

    case "createDistributedQueue":
      await session.create(jmsResource(step.module, "distributedQueues"), {
        name: step.name,
        JNDIName: step.jndiName,
        loadBalancingPolicy: step.loadBalancingPolicy,
      });
      return "created";

    case "addDistributedQueueMember":
      await session.create(
        [...jmsResource(step.module, "distributedQueues"), step.distributedQueue, "distributedQueueMembers"],
        { name: step.member }
      );
      return "created";

    case "activate":
      await session.activate();
      return "done";

    case "disconnect":
      await session.disconnect();
      return "done";
  }
}

// =============================================================================
// Entry point
// =============================================================================

export interface ProvisionMessagingOptions {
  /** Wait for the admin server to report RUNNING first (default: true) */
  wait?: boolean;
  fetch?: FetchFn;
  sleep?: (ms: number) => Promise<void>;
}

export interface ProvisionMessagingResult {
  report: StepReport[];
  duration: string;
}

export async function provisionMessaging(
  config: Config,
  options: ProvisionMessagingOptions = {}
): Promise<ProvisionMessagingResult> {
  const timer = createTimer();
  const credentials = await resolveCredentials(config);

  const client = new AdminRestClient({
    baseUrl: config.ADMIN_URL,
    credentials,
    timeoutMs: config.ADMIN_REQUEST_TIMEOUT_MS,
    fetch: options.fetch,
  });

  if (options.wait ?? true) {
    await waitForAdminServer(client, {
      timeoutMs: config.ADMIN_READY_TIMEOUT_MS,
      pollIntervalMs: config.ADMIN_READY_POLL_MS,
      sleep: options.sleep,
    });
  }

  const plan = buildMessagingPlan(messagingPlanInput(config));
  log.jms.info({ url: config.ADMIN_URL, steps: plan.length }, "provisioning JMS resources");

  const report = await applyMessagingPlan(new RestEditSession(client), plan);
  const duration = timer();

  log.jms.info({
    created: report.filter((r) => r.outcome === "created").length,
    skipped: report.filter((r) => r.outcome === "skipped").length,
    duration,
  }, "JMS resources provisioned");

  return { report, duration };
}
