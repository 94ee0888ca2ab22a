import { Activity } from './activity.enum';

export enum AuditedEntityKind {
  MATTER = 'Matter',
  DOCUMENT = 'Document',
  REVISION = 'Revision',
  // Cross-matter transfer of a document
  MATTER_DOCUMENT = 'MatterDocument',
}

/**
 * Activities each ledger accepts. Appending anything else is rejected before
 * a record is built.
 */
export const ACTIVITIES_BY_ENTITY: Readonly<
  Record<AuditedEntityKind, readonly Activity[]>
> = Object.freeze({
  [AuditedEntityKind.MATTER]: Object.freeze([
    Activity.CREATED,
    Activity.UPDATED,
    Activity.DELETED,
    Activity.RESTORED,
    Activity.ARCHIVED,
    Activity.UNARCHIVED,
    Activity.VIEWED,
  ]),
  [AuditedEntityKind.DOCUMENT]: Object.freeze([
    Activity.CREATED,
    Activity.UPDATED,
    Activity.DELETED,
    Activity.RESTORED,
    Activity.CHECKED_IN,
    Activity.CHECKED_OUT,
    Activity.VIEWED,
  ]),
  [AuditedEntityKind.REVISION]: Object.freeze([
    Activity.CREATED,
    Activity.UPDATED,
    Activity.DELETED,
    Activity.RESTORED,
    Activity.VIEWED,
  ]),
  [AuditedEntityKind.MATTER_DOCUMENT]: Object.freeze([
    Activity.MOVED,
    Activity.COPIED,
  ]),
});
