/**
 * Resource Summary Workflow
 */
import { MENU_LABELS } from "../config/constants";
import type { ResourceSummary } from "../shared/types/portal.types";
import { resolveMenu } from "../scraping/navigators/menu-navigator";
import { extractResourceSummary } from "../scraping/extractors/resource.extractor";
import { runWorkflow, type WorkflowDependencies, type WorkflowOptions } from "./workflow-context";

export interface ResourceSummaryResult {
  summary: ResourceSummary;
  /** The decoded page as served */
  html: string;
}

export function getResourceSummary(
  deps: WorkflowDependencies,
  options: WorkflowOptions = {}
): Promise<ResourceSummaryResult> {
  return runWorkflow("getResourceSummary", deps, options, async (ctx) => {
    const { session, signal } = ctx;
    const menuUrl = await resolveMenu(session, deps.loginPath, MENU_LABELS.RESOURCE_MANAGER, signal);
    const page = await session.getPage(menuUrl, signal);
    const summary = extractResourceSummary(page.$);
    ctx.log.info(
      { shortName: summary.manager.shortName, cidrBlocks: summary.cidrBlocks.length },
      "Resource summary extracted"
    );
    return { summary, html: page.html };
  });
}
