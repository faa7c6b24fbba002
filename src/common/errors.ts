/** The backing location of a cluster metadata document does not exist. */
export class NotFoundError extends Error {
  constructor(readonly location: string) {
    super(`Cluster metadata not found at ${location}.`);
    this.name = 'NotFoundError';
  }
}

/** Cluster metadata content could not be interpreted as a membership document. */
export class MalformedDocumentError extends Error {
  constructor(readonly location: string, reason: string, cause?: unknown) {
    super(`Malformed cluster metadata at ${location}: ${reason}.`);
    this.name = 'MalformedDocumentError';
    this.cause = cause;
  }
}

/** No entry for the given pnn exists in the cluster metadata. */
export class NodeNotPresentError extends Error {
  constructor(readonly identity: string, readonly pnn: number) {
    super(`Node ${identity} (pnn ${pnn}) is not present in the cluster metadata.`);
    this.name = 'NodeNotPresentError';
  }
}

/** Another node has already registered the given pnn. */
export class DuplicatePnnError extends Error {
  constructor(readonly pnn: number, readonly existingNode: string) {
    super(`Duplicate pnn ${pnn}: already registered to ${existingNode}.`);
    this.name = 'DuplicatePnnError';
  }
}

/** The cluster metadata and the nodes list disagree about a position. */
export class InconsistencyError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InconsistencyError';
  }
}

/** Applying a pnn would leave a gap in (or skip behind) the nodes list. */
export class OutOfOrderError extends InconsistencyError {
  constructor(readonly pnn: number, readonly expectedPnn: number) {
    super(`Out of order pnn ${pnn}: the next position in the nodes list is ${expectedPnn}.`);
    this.name = 'OutOfOrderError';
  }
}

/** A caller supplied an address, pnn or option that cannot be used. */
export class InvalidArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidArgumentError';
  }
}
