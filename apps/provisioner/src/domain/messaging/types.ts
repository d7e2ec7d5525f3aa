export type LoadBalancingPolicy = "Round-Robin" | "Random";

export type MessagingStep =
  | { op: "startEdit" }
  /** Created only when the domain has no JMS server yet */
  | { op: "ensureJmsServer"; name: string }
  /** Targets the admin server; the sub-deployment targets every JMS server */
  | { op: "createJmsModule"; name: string; subDeployment: string }
  | { op: "createConnectionFactory"; module: string; name: string; jndiName: string; subDeployment: string }
  | { op: "createQueue"; module: string; name: string; jndiName: string; subDeployment: string }
  | {
      op: "createDistributedQueue";
      module: string;
      name: string;
      jndiName: string;
      loadBalancingPolicy: LoadBalancingPolicy;
    }
  | { op: "addDistributedQueueMember"; module: string; distributedQueue: string; member: string }
  | { op: "activate" }
  | { op: "disconnect" };

export interface MessagingPlanInput {
  jmsServer: string;
  module: string;
  subDeployment: string;
  connectionFactory: string;
  queue: string;
  distributedQueue: string;
  members: string[];
  jndiPrefix: string;
  loadBalancingPolicy: LoadBalancingPolicy;
}

export type StepOutcome = "created" | "skipped" | "done";

export interface StepReport {
  step: MessagingStep;
  outcome: StepOutcome;
}
