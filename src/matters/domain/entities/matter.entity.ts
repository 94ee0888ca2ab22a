export type MatterProps = {
  id: string;
  description: string;
  createdAt: Date;
  isArchived: boolean;
  isDeleted: boolean;
  // Optimistic concurrency counter, bumped by every persisted update
  version: number;
};

export class Matter implements MatterProps {
  id: string;
  description: string;
  createdAt: Date;
  isArchived: boolean;
  isDeleted: boolean;
  version: number;

  constructor(props: MatterProps) {
    this.id = props.id;
    this.description = props.description;
    this.createdAt = props.createdAt;
    this.isArchived = props.isArchived;
    this.isDeleted = props.isDeleted;
    this.version = props.version;
  }
}
