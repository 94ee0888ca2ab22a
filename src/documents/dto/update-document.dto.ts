import { PartialType } from '@nestjs/swagger';
import { NullableType } from '../../utils/types/nullable.type';
import { CreateDocumentDto } from './create-document.dto';

export class UpdateDocumentDto extends PartialType(CreateDocumentDto) {}

export const UPDATABLE_DOCUMENT_FIELDS = [
  'fileName',
  'extension',
  'fileSize',
  'mimeType',
  'checksum',
] as const satisfies readonly (keyof UpdateDocumentDto)[];

/**
 * What callers may send. An omitted field is left unchanged; a null one is
 * rejected, since every document column is required.
 */
export type UpdateDocumentPayload = {
  [K in keyof UpdateDocumentDto]?: NullableType<UpdateDocumentDto[K]>;
};
