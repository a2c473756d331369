import { IsNotEmpty, IsString } from 'class-validator';

export class ResourceIdDto {
  @IsString()
  @IsNotEmpty()
  id!: string;
}
