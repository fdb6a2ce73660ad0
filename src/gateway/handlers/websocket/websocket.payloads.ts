import { Type } from 'class-transformer';
import {
  IsArray,
  IsBoolean,
  IsNumber,
  IsOptional,
  IsString,
  Max,
  Min,
  ValidateNested,
} from 'class-validator';

// latest instant a Date can hold, in epoch seconds
const MAX_EPOCH_SECONDS = 8.64e12;

export class RegisterPayload {
  @IsOptional()
  @IsString()
  urn?: string;

  @IsOptional()
  @IsString()
  language?: string;
}

export class ReceivedMessage {
  @IsOptional()
  @IsBoolean()
  fromMe?: boolean;

  @IsOptional()
  @IsNumber()
  @Min(0)
  @Max(MAX_EPOCH_SECONDS)
  time?: number; // epoch seconds

  @IsOptional()
  @IsString()
  author?: string; // e.g. 5511999999999@c.us

  @IsOptional()
  @IsString()
  senderName?: string;

  @IsOptional()
  @IsString()
  body?: string;

  @IsOptional()
  @IsString()
  caption?: string;

  @IsOptional()
  @IsString()
  type?: string;

  @IsOptional()
  @IsString()
  id?: string;
}

export class ReceivedAck {
  @IsOptional()
  @IsString()
  id?: string;

  @IsOptional()
  @IsString()
  status?: string;
}

export class ReceivePayload {
  @IsOptional()
  @IsString()
  instanceId?: string;

  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => ReceivedMessage)
  messages?: ReceivedMessage[];

  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => ReceivedAck)
  ack?: ReceivedAck[];
}

/** Body POSTed to the channel address for each outgoing message part. */
export interface SendPayload {
  ID: string;
  Text: string;
  To: string;
  ToNoPlus: string;
  From: string;
  FromNoPlus: string;
  Channel: string;
  Metadata?: { quick_replies: string[] };
  Attachments?: string[];
}
