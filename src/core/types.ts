import type {
  CustomAttributeDeleteResult,
  CustomAttributeResult,
  ProviderDeleteResult,
  ProviderResult,
} from "@/lib/types";

export type ItemKind = "provider" | "custom-attributes";
export type ItemAction = "apply" | "delete";

export type ItemResult =
  | ProviderResult
  | ProviderDeleteResult
  | CustomAttributeResult
  | CustomAttributeDeleteResult;

export interface ItemReport {
  kind: ItemKind;
  name: string;
  action: ItemAction;
  changed: boolean;
  failed: boolean;
  msg: string;
  result: ItemResult | null;
}

export interface RunResult {
  success: boolean;
  dryRun: boolean;
  items: ItemReport[];
  elapsedMs: number;
}
