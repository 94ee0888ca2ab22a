import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { RevisionRepository } from '../../../domain/ports/revision.repository.port';
import { RevisionEntity } from './entities/revision.entity';
import { RevisionRelationalRepository } from './repositories/revision.repository';

@Module({
  imports: [TypeOrmModule.forFeature([RevisionEntity])],
  providers: [
    {
      provide: RevisionRepository,
      useClass: RevisionRelationalRepository,
    },
  ],
  exports: [RevisionRepository],
})
export class RelationalRevisionPersistenceModule {}
