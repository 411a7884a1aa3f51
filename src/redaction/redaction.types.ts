import type { TabularPayload } from "../pipeline/tabular";

export type RedactionRequest = {
  project: string;
  payload: TabularPayload;
  detectorCategories: string[];
  fieldsToRedact: string[];
  placeholder: string;
};

export interface RedactionService {
  /** Returns a payload of the same shape with findings replaced. */
  deidentify(request: RedactionRequest): Promise<TabularPayload>;
}
