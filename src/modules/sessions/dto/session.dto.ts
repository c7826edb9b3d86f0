import { IsString, IsOptional, IsBoolean } from 'class-validator';

export class CreateSessionDto {
  @IsString()
  @IsOptional()
  api_key?: string;

  @IsBoolean()
  @IsOptional()
  demo_mode?: boolean;
}

export class UpdateSettingsDto {
  /** 传空字符串表示清除会话自己的 key */
  @IsString()
  @IsOptional()
  api_key?: string;

  @IsBoolean()
  @IsOptional()
  demo_mode?: boolean;
}

export interface SessionResponseDto {
  session_id: string;
  demo_mode: boolean;
  has_api_key: boolean;
  processing: boolean;
  result_count: number;
  created_at: string;
}
