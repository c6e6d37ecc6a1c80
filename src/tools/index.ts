import searchBestPracticesTool from './search-best-practices/tool';
import getCodeSnippetTool from './get-code-snippet/tool';
import troubleshootIssueTool from './troubleshoot-issue/tool';
import getTipsForFeatureTool from './get-tips-for-feature/tool';
import checkGovernanceZoneTool from './check-governance-zone/tool';
import type { MCPTool } from '@/types/tool';

export const TOOL_NAME = {
  SEARCH_BEST_PRACTICES: 'search_best_practices',
  GET_CODE_SNIPPET: 'get_code_snippet',
  TROUBLESHOOT_ISSUE: 'troubleshoot_issue',
  GET_TIPS_FOR_FEATURE: 'get_tips_for_feature',
  CHECK_GOVERNANCE_ZONE: 'check_governance_zone',
} as const;

export type ToolName = (typeof TOOL_NAME)[keyof typeof TOOL_NAME];

export const ALL_TOOLS: readonly MCPTool[] = [
  searchBestPracticesTool,
  getCodeSnippetTool,
  troubleshootIssueTool,
  getTipsForFeatureTool,
  checkGovernanceZoneTool,
];

export {
  searchBestPracticesTool,
  getCodeSnippetTool,
  troubleshootIssueTool,
  getTipsForFeatureTool,
  checkGovernanceZoneTool,
};
