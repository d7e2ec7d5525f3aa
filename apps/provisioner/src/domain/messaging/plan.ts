import type { Config } from "../../config.js";
import type { MessagingPlanInput, MessagingStep } from "./types.js";

export function messagingPlanInput(config: Config): MessagingPlanInput {
  return {
    jmsServer: config.JMS_SERVER_NAME,
    module: config.JMS_MODULE_NAME,
    subDeployment: config.JMS_SUBDEPLOYMENT_NAME,
    connectionFactory: config.JMS_CONNECTION_FACTORY_NAME,
    queue: config.JMS_QUEUE_NAME,
    distributedQueue: config.JMS_DISTRIBUTED_QUEUE_NAME,
    members: config.JMS_DISTRIBUTED_QUEUE_MEMBERS,
    jndiPrefix: config.JMS_JNDI_PREFIX,
    loadBalancingPolicy: config.JMS_LOAD_BALANCING_POLICY,
  };
}

/**
 * Fixed provisioning order: server, module, factory, queue, distributed
 * queue, member queues, memberships, then activate and disconnect.
 */
export function buildMessagingPlan(input: MessagingPlanInput): MessagingStep[] {
  const { module, subDeployment, jndiPrefix } = input;
  const jndi = (name: string) => `${jndiPrefix}${name}`;

  return [
    { op: "startEdit" },
    { op: "ensureJmsServer", name: input.jmsServer },
    { op: "createJmsModule", name: module, subDeployment },
    {
      op: "createConnectionFactory",
      module,
      name: input.connectionFactory,
      jndiName: jndi(input.connectionFactory),
      subDeployment,
    },
    { op: "createQueue", module, name: input.queue, jndiName: jndi(input.queue), subDeployment },
    {
      op: "createDistributedQueue",
      module,
      name: input.distributedQueue,
      jndiName: jndi(input.distributedQueue),
      loadBalancingPolicy: input.loadBalancingPolicy,
    },
    ...input.members.map(
      (member): MessagingStep => ({ op: "createQueue", module, name: member, jndiName: jndi(member), subDeployment })
    ),
    ...input.members.map(
      (member): MessagingStep => ({
        op: "addDistributedQueueMember",
        module,
        distributedQueue: input.distributedQueue,
        member,
      })
    ),
    { op: "activate" },
    { op: "disconnect" },
  ];
}

export function describeStep(step: MessagingStep): string {
  switch (step.op) {
    case "startEdit":
      return "start edit session";
    case "ensureJmsServer":
      return `create JMS server ${step.name} unless one exists`;
    case "createJmsModule":
      return `create JMS module ${step.name} with sub-deployment ${step.subDeployment}`;
    case "createConnectionFactory":
      return `create connection factory ${step.name} (${step.jndiName})`;
    case "createQueue":
      return `create queue ${step.name} (${step.jndiName})`;
    case "createDistributedQueue":
      return `create distributed queue ${step.name} (${step.jndiName}, ${step.loadBalancingPolicy})`;
    case "addDistributedQueueMember":
      return `add ${step.member} to ${step.distributedQueue}`;
    case "activate":
      return "save and activate changes";
    case "disconnect":
      return "disconnect";
  }
}
