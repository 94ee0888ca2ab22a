import { NullableType } from '../../../utils/types/nullable.type';
import { Document, DocumentProps } from '../entities/document.entity';

export type CheckStateChange = Pick<
  DocumentProps,
  'isCheckedOut' | 'checkedOutBy'
>;

export type CheckTransition =
  | { allowed: true; changes: CheckStateChange }
  | { allowed: false; reason: string };

/**
 * Document check-out lock
 *
 * Transitions:
 * - AVAILABLE → CHECKED_OUT(user) on check-out
 * - CHECKED_OUT(user) → AVAILABLE on check-in by the same user
 *
 * There is no forced takeover: checking out a checked-out document fails,
 * as does checking in an available one. Deleted documents cannot be
 * checked out, and checked-out documents cannot be deleted.
 */
export class DocumentCheckState {
  static checkOut(document: Document, userId: string): CheckTransition {
    if (document.isDeleted) {
      return {
        allowed: false,
        reason: `Document ${document.id} is deleted and cannot be checked out`,
      };
    }
    if (document.isCheckedOut) {
      return {
        allowed: false,
        reason: `Document ${document.id} is already checked out`,
      };
    }
    return {
      allowed: true,
      changes: { isCheckedOut: true, checkedOutBy: userId },
    };
  }

  static checkIn(document: Document, userId: string): CheckTransition {
    if (!document.isCheckedOut) {
      return {
        allowed: false,
        reason: `Document ${document.id} is not checked out`,
      };
    }
    if (document.checkedOutBy !== null && document.checkedOutBy !== userId) {
      return {
        allowed: false,
        reason: `Document ${document.id} is checked out by another user`,
      };
    }
    return {
      allowed: true,
      changes: { isCheckedOut: false, checkedOutBy: null },
    };
  }

  static transition(
    document: Document,
    checkedOut: boolean,
    userId: string,
  ): CheckTransition {
    return checkedOut
      ? DocumentCheckState.checkOut(document, userId)
      : DocumentCheckState.checkIn(document, userId);
  }

  /**
   * Reason `userId` may not edit the document or its revisions, or null
   * when the document is available or locked by that same user.
   */
  static lockedAgainst(
    document: Document,
    userId: string,
  ): NullableType<string> {
    if (document.isCheckedOut && document.checkedOutBy !== userId) {
      return `Document ${document.id} is checked out by another user`;
    }
    return null;
  }

  static deletionBlockedBy(document: Document): NullableType<string> {
    if (document.isDeleted) {
      return `Document ${document.id} is already deleted`;
    }
    if (document.isCheckedOut) {
      return `Document ${document.id} is checked out and cannot be deleted`;
    }
    return null;
  }
}
