import type { AuditRecord } from "../types/events.js";
import { INITIAL_PRODUCT_STATUS } from "../types/product.js";

export interface CustodyStep {
  sequence: number;
  owner: string;
  status: string;
  timestamp: string;
  from?: string;
}

export interface CustodyChain {
  id: string;
  registeredBy: string;
  detailsUri: string;
  steps: CustodyStep[];
}

export class CustodyReplayError extends Error {
  constructor(
    message: string,
    readonly sequence: number,
  ) {
    super(message);
    this.name = "CustodyReplayError";
  }
}

/**
 * Folds one product's audit records into its custody chain. Records must be
 * in commit order and start with the registration; the registry never keeps
 * this history itself, so indexers and auditors rebuild it here.
 */
export function reconstructCustodyChain(
  records: AuditRecord[],
  initialStatus = INITIAL_PRODUCT_STATUS,
): CustodyChain {
  const [first, ...rest] = records;
  if (!first) {
    throw new CustodyReplayError("No records to replay", 0);
  }
  if (first.event.type !== "ProductRegistered") {
    throw new CustodyReplayError(
      `Replay must start with ProductRegistered, got ${first.event.type}`,
      first.sequence,
    );
  }

  const chain: CustodyChain = {
    id: first.event.id,
    registeredBy: first.event.authorityId,
    detailsUri: first.event.detailsUri,
    steps: [
      {
        sequence: first.sequence,
        owner: first.event.authorityId,
        status: initialStatus,
        timestamp: first.event.timestamp,
      },
    ],
  };

  let owner = first.event.authorityId;
  let lastSequence = first.sequence;

  for (const record of rest) {
    if (record.sequence <= lastSequence) {
      throw new CustodyReplayError(
        `Record ${record.sequence} is out of order (after ${lastSequence})`,
        record.sequence,
      );
    }
    if (record.event.id !== chain.id) {
      throw new CustodyReplayError(
        `Record ${record.sequence} belongs to '${record.event.id}', not '${chain.id}'`,
        record.sequence,
      );
    }
    if (record.event.type === "ProductRegistered") {
      throw new CustodyReplayError(
        `Product '${chain.id}' registered twice`,
        record.sequence,
      );
    }
    if (record.event.oldOwner !== owner) {
      throw new CustodyReplayError(
        `Transfer by '${record.event.oldOwner}' but custody is held by '${owner}'`,
        record.sequence,
      );
    }

    chain.steps.push({
      sequence: record.sequence,
      owner: record.event.newOwner,
      status: record.event.newStatus,
      timestamp: record.event.timestamp,
      from: owner,
    });
    owner = record.event.newOwner;
    lastSequence = record.sequence;
  }

  return chain;
}
