import type { protos } from "@google-cloud/dlp";
import { DLP_REQUEST_LIMIT_BYTES } from "../config/constants";
import type { TabularPayload } from "../pipeline/tabular";
import { logger } from "../utils/logger";
import {
  buildDeidentifyRequest,
  DeidentifyContentRequest,
  fromDlpTable,
} from "./request-builder";
import type { RedactionRequest, RedactionService } from "./redaction.types";

/** The call this adapter makes on a `DlpServiceClient`. */
export type DlpHandle = {
  deidentifyContent(
    request: DeidentifyContentRequest
  ): Promise<
    [protos.google.privacy.dlp.v2.IDeidentifyContentResponse, ...unknown[]]
  >;
};

export class DlpRedactionService implements RedactionService {
  constructor(
    private readonly client: DlpHandle,
    private readonly location: string
  ) {}

  async deidentify(request: RedactionRequest): Promise<TabularPayload> {
    const body = buildDeidentifyRequest(request, this.location);

    const approxBytes = Buffer.byteLength(JSON.stringify(body.item));
    if (approxBytes > DLP_REQUEST_LIMIT_BYTES) {
      logger.warn(
        `De-identify payload is ~${approxBytes} bytes, above the ${DLP_REQUEST_LIMIT_BYTES} byte request limit; the call may be rejected`
      );
    }

    const [response] = await this.client.deidentifyContent(body);
    return fromDlpTable(response.item?.table);
  }
}
