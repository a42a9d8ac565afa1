import { CapabilityRegistry } from './registry.js';
import { DIAGNOSIS_TOOL_NAME, DiseaseDiagnosisTool, diseaseDiagnosisArgs, diseaseDiagnosisDefinition } from './diseaseDiagnosis.js';
import { MARKET_TOOL_NAME, MarketPriceTool, marketPriceArgs, marketPriceDefinition } from './marketPrice.js';
import { SCHEME_TOOL_NAME, SchemeSearchTool, schemeSearchArgs, schemeSearchDefinition } from './schemeSearch.js';

export const TOOL_NAMES = [MARKET_TOOL_NAME, DIAGNOSIS_TOOL_NAME, SCHEME_TOOL_NAME] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

export interface AgentTools {
  market: MarketPriceTool;
  diagnosis: DiseaseDiagnosisTool;
  schemes: SchemeSearchTool;
}

export function buildToolRegistry(tools: AgentTools): CapabilityRegistry<ToolName> {
  return new CapabilityRegistry<ToolName>()
    .register({
      definition: marketPriceDefinition,
      schema: marketPriceArgs,
      owner: tools.market,
      operation: (market, args) => market.getCommodityPrice(args)
    })
    .register({
      definition: diseaseDiagnosisDefinition,
      schema: diseaseDiagnosisArgs,
      owner: tools.diagnosis,
      operation: (diagnosis, args) => diagnosis.diagnose(args)
    })
    .register({
      definition: schemeSearchDefinition,
      schema: schemeSearchArgs,
      owner: tools.schemes,
      operation: (schemes, args) => schemes.search(args)
    });
}

export { CapabilityRegistry } from './registry.js';
export { MarketPriceTool } from './marketPrice.js';
export { DiseaseDiagnosisTool } from './diseaseDiagnosis.js';
export { SchemeSearchTool } from './schemeSearch.js';
