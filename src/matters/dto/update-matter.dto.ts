import { PickType } from '@nestjs/swagger';
import { CreateMatterDto } from './create-matter.dto';

export class UpdateMatterDto extends PickType(CreateMatterDto, [
  'description',
] as const) {}
