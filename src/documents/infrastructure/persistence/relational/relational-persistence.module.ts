import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { DocumentRepository } from '../../../domain/ports/document.repository.port';
import { DocumentEntity } from './entities/document.entity';
import { DocumentRelationalRepository } from './repositories/document.repository';

@Module({
  imports: [TypeOrmModule.forFeature([DocumentEntity])],
  providers: [
    {
      provide: DocumentRepository,
      useClass: DocumentRelationalRepository,
    },
  ],
  exports: [DocumentRepository],
})
export class RelationalDocumentPersistenceModule {}
