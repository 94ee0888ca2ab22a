import { NullableType } from '../../../utils/types/nullable.type';

export type DocumentProps = {
  id: string;
  matterId: string;

  // File metadata
  fileName: string;
  extension: string;
  fileSize: number; // Bytes
  mimeType: string;
  checksum: string; // SHA-256, lowercase hex

  // Check-out lock: checkedOutBy is set exactly when isCheckedOut is true
  isCheckedOut: boolean;
  checkedOutBy: NullableType<string>;

  isDeleted: boolean;
  createdAt: Date;
  version: number;
};

export class Document implements DocumentProps {
  id: string;
  matterId: string;
  fileName: string;
  extension: string;
  fileSize: number;
  mimeType: string;
  checksum: string;
  isCheckedOut: boolean;
  checkedOutBy: NullableType<string>;
  isDeleted: boolean;
  createdAt: Date;
  version: number;

  constructor(props: DocumentProps) {
    this.id = props.id;
    this.matterId = props.matterId;
    this.fileName = props.fileName;
    this.extension = props.extension;
    this.fileSize = props.fileSize;
    this.mimeType = props.mimeType;
    this.checksum = props.checksum;
    this.isCheckedOut = props.isCheckedOut;
    this.checkedOutBy = props.checkedOutBy;
    this.isDeleted = props.isDeleted;
    this.createdAt = props.createdAt;
    this.version = props.version;
  }
}
