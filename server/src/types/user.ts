export interface UserRecord {
  identity: string;
  nickname: string;
  /** Last issued access URL; may have expired. */
  image_url?: string;
  /** Object key of the current photo. */
  image_key?: string;
  created_at: string;
  updated_at: string;
}

export interface ImageRef {
  url: string;
  key: string;
}

export interface AssetRef {
  key: string;
  accessUrl: string;
}

export interface AssetObject {
  key: string;
  size?: number;
  lastModified?: string;
}

export interface AssetDeleteFailure {
  key: string;
  code: string;
  message: string;
}

export interface DeleteManyResult {
  deleted: string[];
  failed: AssetDeleteFailure[];
}

export interface RequestIdentity {
  identity: string;
  claims: Record<string, string>;
}

export interface ServiceConfig {
  maxImageBytes: number;
  maxWidth: number;
  maxHeight: number;
  jpegQuality: number;
  accessUrlTtlDays: number;
  nicknameMinLen: number;
  nicknameMaxLen: number;
  reservedNicknames: string[];
  externalCallTimeoutMs: number;
}
