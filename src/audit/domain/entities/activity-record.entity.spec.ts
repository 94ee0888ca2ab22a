import { Activity } from '../enums/activity.enum';
import { AuditedEntityKind } from '../enums/audited-entity-kind.enum';
import { TransferDirection } from '../enums/transfer-direction.enum';
import { ActivityRecords } from './activity-record.entity';

const USER = '5b1f4c2e-8d3a-4e7b-9c6f-1a2b3c4d5e6f';
const SOURCE = '6a1f4c2e-8d3a-4e7b-9c6f-1a2b3c4d5e6f';
const TARGET = '7a1f4c2e-8d3a-4e7b-9c6f-1a2b3c4d5e6f';
const DOCUMENT = '8a1f4c2e-8d3a-4e7b-9c6f-1a2b3c4d5e6f';

describe('ActivityRecords', () => {
  it('should keep its timestamp when the caller changes theirs', () => {
    const at = new Date('2026-03-01T09:00:00.000Z');
    const record = ActivityRecords.forDocument(
      DOCUMENT,
      Activity.CHECKED_OUT,
      USER,
      at,
    );

    at.setTime(0);

    expect(record.createdAt.toISOString()).toBe('2026-03-01T09:00:00.000Z');
    expect(Object.isFrozen(record)).toBe(true);
  });

  it('should reject an activity the entity kind does not record', () => {
    expect(() =>
      ActivityRecords.forRevision(DOCUMENT, Activity.CHECKED_OUT, USER),
    ).toThrow(new RangeError('CHECKED_OUT is not a Revision activity'));
  });

  describe('transferPair', () => {
    it('should build mirrored halves sharing one instant', () => {
      const at = new Date('2026-03-01T09:00:00.000Z');
      const [from, to] = ActivityRecords.transferPair({
        sourceMatterId: SOURCE,
        targetMatterId: TARGET,
        documentId: DOCUMENT,
        activity: Activity.MOVED,
        userId: USER,
        createdAt: at,
      });

      at.setTime(0);

      expect(from).toMatchObject({
        kind: AuditedEntityKind.MATTER_DOCUMENT,
        matterId: SOURCE,
        counterpartMatterId: TARGET,
        direction: TransferDirection.FROM,
      });
      expect(to).toMatchObject({
        matterId: TARGET,
        counterpartMatterId: SOURCE,
        direction: TransferDirection.TO,
      });
      expect(from.createdAt.getTime()).toBe(to.createdAt.getTime());
      expect(to.createdAt.toISOString()).toBe('2026-03-01T09:00:00.000Z');
      expect(from.createdAt).not.toBe(to.createdAt);
    });
  });
});
