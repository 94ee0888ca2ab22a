import { Document } from '../entities/document.entity';
import { DocumentCheckState } from './document-check-state.util';

const HOLDER = '9a8b7c6d-5e4f-4a3b-8c2d-1e0f9a8b7c6d';
const OTHER = '1b2c3d4e-5f6a-4b7c-8d9e-0f1a2b3c4d5e';

const documentWith = (overrides: Partial<Document> = {}): Document =>
  new Document({
    id: 'c1d2e3f4-a5b6-4c7d-8e9f-0a1b2c3d4e5f',
    matterId: 'f0e1d2c3-b4a5-4968-8776-655443322110',
    fileName: 'engagement-letter',
    extension: 'pdf',
    fileSize: 2048,
    mimeType: 'application/pdf',
    checksum: 'a'.repeat(64),
    isCheckedOut: false,
    checkedOutBy: null,
    isDeleted: false,
    createdAt: new Date('2025-03-01T09:00:00Z'),
    version: 1,
    ...overrides,
  });

const checkedOut = (): Document =>
  documentWith({ isCheckedOut: true, checkedOutBy: HOLDER });

describe('DocumentCheckState', () => {
  describe('checkOut', () => {
    it('should lock an available document to the user', () => {
      expect(DocumentCheckState.checkOut(documentWith(), HOLDER)).toEqual({
        allowed: true,
        changes: { isCheckedOut: true, checkedOutBy: HOLDER },
      });
    });

    it('should not take over a checked-out document', () => {
      const document = checkedOut();

      expect(DocumentCheckState.checkOut(document, OTHER)).toEqual({
        allowed: false,
        reason: `Document ${document.id} is already checked out`,
      });
      expect(DocumentCheckState.checkOut(document, HOLDER)).toEqual({
        allowed: false,
        reason: `Document ${document.id} is already checked out`,
      });
    });

    it('should refuse a deleted document', () => {
      const document = documentWith({ isDeleted: true });

      expect(DocumentCheckState.checkOut(document, HOLDER)).toEqual({
        allowed: false,
        reason: `Document ${document.id} is deleted and cannot be checked out`,
      });
    });
  });

  describe('checkIn', () => {
    it('should release the holder lock', () => {
      expect(DocumentCheckState.checkIn(checkedOut(), HOLDER)).toEqual({
        allowed: true,
        changes: { isCheckedOut: false, checkedOutBy: null },
      });
    });

    it('should refuse an available document', () => {
      const document = documentWith();

      expect(DocumentCheckState.transition(document, false, HOLDER)).toEqual({
        allowed: false,
        reason: `Document ${document.id} is not checked out`,
      });
    });

    it('should refuse anyone but the holder', () => {
      const document = checkedOut();

      expect(DocumentCheckState.checkIn(document, OTHER)).toEqual({
        allowed: false,
        reason: `Document ${document.id} is checked out by another user`,
      });
    });
  });

  it('should lock edits against other users only', () => {
    const document = checkedOut();

    expect(DocumentCheckState.lockedAgainst(document, HOLDER)).toBeNull();
    expect(DocumentCheckState.lockedAgainst(document, OTHER)).toBe(
      `Document ${document.id} is checked out by another user`,
    );
    expect(DocumentCheckState.lockedAgainst(documentWith(), OTHER)).toBeNull();
  });

  it('should block deletion while deleted or checked out', () => {
    const deleted = documentWith({ isDeleted: true });
    const locked = checkedOut();

    expect(DocumentCheckState.deletionBlockedBy(documentWith())).toBeNull();
    expect(DocumentCheckState.deletionBlockedBy(deleted)).toBe(
      `Document ${deleted.id} is already deleted`,
    );
    expect(DocumentCheckState.deletionBlockedBy(locked)).toBe(
      `Document ${locked.id} is checked out and cannot be deleted`,
    );
  });
});
