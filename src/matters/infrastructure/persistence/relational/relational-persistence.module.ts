import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { MatterRepository } from '../../../domain/ports/matter.repository.port';
import { MatterEntity } from './entities/matter.entity';
import { MatterRelationalRepository } from './repositories/matter.repository';

@Module({
  imports: [TypeOrmModule.forFeature([MatterEntity])],
  providers: [
    {
      provide: MatterRepository,
      useClass: MatterRelationalRepository,
    },
  ],
  exports: [MatterRepository],
})
export class RelationalMatterPersistenceModule {}
