/**
 * Query Request DTO
 * Input for the retrieval pipeline. Length and topK bounds that depend on
 * configuration are enforced by the orchestrator.
 */

import { Type } from 'class-transformer';
import {
  IsArray,
  IsIn,
  IsInt,
  IsOptional,
  IsString,
  Max,
  Min,
  ValidateNested,
} from 'class-validator';
import {
  RETRIEVAL_POLICY_NAMES,
  type RetrievalPolicyName,
} from '../config/retrieval-options';

export class ConversationMessageDto {
  @IsIn(['user', 'assistant', 'system'])
  role!: 'user' | 'assistant' | 'system';

  @IsString()
  content!: string;
}

export class QueryRequestDto {
  @IsString()
  query!: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(100)
  topK?: number;

  @IsOptional()
  @IsIn(RETRIEVAL_POLICY_NAMES)
  policy?: RetrievalPolicyName;

  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => ConversationMessageDto)
  history?: ConversationMessageDto[];
}
