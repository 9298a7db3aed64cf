/**
 * ASSET GRAPH ERRORS
 *
 * Every failure is synchronous and leaves the graph unchanged.
 */

import type { ZodError } from 'zod';
import { AppError } from '../../../common/errors.js';

export type GraphNodeKind = 'asset' | 'event' | 'node';

export class DuplicateIdError extends AppError {
  public readonly id: string;

  constructor(id: string) {
    super('DUPLICATE_ID', `Node id "${id}" is already present in the graph`, 409, { id });
    this.name = 'DuplicateIdError';
    this.id = id;
  }
}

export class NotFoundError extends AppError {
  public readonly id: string;
  public readonly nodeKind: GraphNodeKind;

  constructor(nodeKind: GraphNodeKind, id: string) {
    super('NOT_FOUND', `Unknown ${nodeKind} "${id}"`, 404, { id, nodeKind });
    this.name = 'NotFoundError';
    this.id = id;
    this.nodeKind = nodeKind;
  }
}

export class InvalidAttributeError extends AppError {
  public readonly issues: string[];

  constructor(subject: string, issues: string[]) {
    super('INVALID_ATTRIBUTE', `Invalid ${subject}: ${issues.join('; ')}`, 400, { issues });
    this.name = 'InvalidAttributeError';
    this.issues = issues;
  }

  static fromZod(subject: string, error: ZodError): InvalidAttributeError {
    const issues = error.issues.map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${path}: ${issue.message}`;
    });
    return new InvalidAttributeError(subject, issues);
  }
}

export class InvalidRelationshipError extends AppError {
  constructor(reason: string, details: Record<string, unknown>) {
    super('INVALID_RELATIONSHIP', `Rejected relationship: ${reason}`, 422, details);
    this.name = 'InvalidRelationshipError';
  }
}

/** A mutation was attempted while another one was still running */
export class GraphBusyError extends AppError {
  constructor(operation: string, activeOperation: string) {
    super(
      'GRAPH_BUSY',
      `Cannot run ${operation} while ${activeOperation} is in progress`,
      409,
      { operation, activeOperation },
    );
    this.name = 'GraphBusyError';
  }
}
