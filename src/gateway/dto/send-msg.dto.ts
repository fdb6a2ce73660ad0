import {
  ArrayMaxSize,
  IsArray,
  IsInt,
  IsOptional,
  IsString,
  IsUUID,
  Min,
} from 'class-validator';

export class SendMsgDto {
  @IsString()
  channelType!: string;

  @IsUUID()
  channelUuid!: string;

  @IsInt()
  @Min(1)
  id!: number;

  @IsUUID()
  uuid!: string;

  @IsString()
  urn!: string; // scheme:path

  @IsString()
  text!: string;

  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  attachments?: string[];

  @IsOptional()
  @IsArray()
  @ArrayMaxSize(10)
  @IsString({ each: true })
  quickReplies?: string[];
}
