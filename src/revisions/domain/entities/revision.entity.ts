export type RevisionProps = {
  id: string;
  documentId: string;
  // 1-based, assigned on creation, never reused
  revisionNumber: number;
  createdAt: Date;
  isDeleted: boolean;
  version: number;
};

export class Revision implements RevisionProps {
  id: string;
  documentId: string;
  revisionNumber: number;
  createdAt: Date;
  isDeleted: boolean;
  version: number;

  constructor(props: RevisionProps) {
    this.id = props.id;
    this.documentId = props.documentId;
    this.revisionNumber = props.revisionNumber;
    this.createdAt = props.createdAt;
    this.isDeleted = props.isDeleted;
    this.version = props.version;
  }
}
