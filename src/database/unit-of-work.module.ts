import { Module } from '@nestjs/common';
import { UnitOfWorkFactory } from './unit-of-work.factory';

@Module({
  providers: [UnitOfWorkFactory],
  exports: [UnitOfWorkFactory],
})
export class UnitOfWorkModule {}
