import { ContextError, DecodeError } from "../shared/errors.js";
import { logger as defaultLogger, type ILogger } from "../shared/logger.js";
import type {
  ClassifiedRule,
  RulesetDocument,
  RulesetRule,
  WorkflowRef,
} from "./types.js";
import { classifyRule, encodeWorkflowsParameters } from "./workflow-codec.js";

/**
 * The part of the entity resolver the rule rewriter needs.
 */
export interface RepositoryResolver {
  resolveRepository(sourceRepoId: number, sourceOrg: string): Promise<number>;
}

export interface RuleRewriteResult {
  /** Number of `workflows` rules rewritten */
  rulesRewritten: number;
  /** Number of workflow references whose repository was translated */
  workflowsRewritten: number;
}

/**
 * Rewrites the repository IDs referenced by `workflows` rules. Every other
 * rule is left exactly as loaded.
 */
export class RuleRewriter {
  private readonly resolver: RepositoryResolver;
  private readonly logger: ILogger;

  constructor(resolver: RepositoryResolver, logger?: ILogger) {
    this.resolver = resolver;
    this.logger = logger ?? defaultLogger;
  }

  async rewrite(document: RulesetDocument): Promise<RuleRewriteResult> {
    const result: RuleRewriteResult = {
      rulesRewritten: 0,
      workflowsRewritten: 0,
    };

    for (const rule of document.rules) {
      const classified = this.classify(document, rule);
      if (classified.kind === "passthrough") {
        continue;
      }

      const { workflows } = classified.parameters;
      // Resolve every workflow before touching the rule so a failure
      // leaves its parameters as loaded.
      const rewritten: WorkflowRef[] = [];
      for (const workflow of workflows) {
        rewritten.push(await this.rewriteWorkflow(document, workflow));
      }

      rule.parameters = encodeWorkflowsParameters({
        ...classified.parameters,
        workflows: rewritten,
      });
      result.rulesRewritten++;
      result.workflowsRewritten += rewritten.length;
    }

    return result;
  }

  private classify(
    document: RulesetDocument,
    rule: RulesetRule
  ): ClassifiedRule {
    try {
      return classifyRule(rule);
    } catch (error) {
      if (error instanceof DecodeError) {
        this.logger.error(
          `Failed to decode workflow parameters in ruleset ${document.name}`
        );
      }
      throw new ContextError(
        `Failed to process workflows in ruleset ${document.name}`,
        error
      );
    }
  }

  private async rewriteWorkflow(
    document: RulesetDocument,
    workflow: WorkflowRef
  ): Promise<WorkflowRef> {
    try {
      const repositoryId = await this.resolver.resolveRepository(
        workflow.repository_id,
        document.source
      );
      return { ...workflow, repository_id: repositoryId };
    } catch (error) {
      this.logger.error(
        `Failed to resolve repository ${workflow.repository_id} for workflow ${workflow.path}`
      );
      throw new ContextError(
        `Failed to process workflows in ruleset ${document.name}: repository ID ${workflow.repository_id}`,
        error
      );
    }
  }
}
