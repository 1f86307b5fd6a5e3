/**
 * User service: create / lookup / photo-attach / delete flows on top of the
 * record and asset repositories.
 * IMPLEMENTATION STATUS:
 * - Nickname uniqueness delegated to the repository's conditional write: OK
 * - Photo replace ordering (put new → update record → delete old) + compensation: OK
 * - Per-call timeouts (EXTERNAL_CALL_TIMEOUT_MS): OK
 */

import { describeError, ServiceError } from '../lib/errors';
import { logger as rootLogger, type Logger } from '../lib/logger';
import { withTimeout } from '../lib/timeout';
import { assetPrefix, type AssetRepository } from '../repositories/asset.repository';
import { RecordStoreError, type UserRepository } from '../repositories/user.repository';
import type { AssetDeleteFailure, ServiceConfig, UserRecord } from '../types/user';
import { ImageError, type ImageNormalizer, type NormalizedImage } from './image.service';
import { NicknameValidator } from './nickname.service';

export const DELETE_WARNING = 'This action cannot be undone';
export const DEFAULT_DELETION_REASON = 'User requested deletion';
const CREATE_USAGE = 'POST /users with {"nickname": "your_nickname"}';
const DELETE_USAGE = 'DELETE /users/{userId}?confirm=true';

export type UserServiceDeps = {
  users: UserRepository;
  assets: AssetRepository;
  images: ImageNormalizer;
  config: ServiceConfig;
  logger?: Logger;
};

export type PhotoAttachInput = {
  identity: string;
  image: Buffer;
  nicknameForNewUser?: string;
  requestingIdentity?: string;
};

export type PhotoSummary = {
  key: string;
  url: string;
  width: number;
  height: number;
  content_type: string;
  original_size: number;
  output_size: number;
  reduction_percent: number;
};

export type PhotoAttachResult = {
  user: UserRecord;
  created: boolean;
  photo: PhotoSummary;
  old_assets: { deleted: string[]; failed: AssetDeleteFailure[] };
};

export type DeleteUserInput = {
  identity: string;
  confirm: boolean;
  requestingIdentity?: string;
  reason?: string;
};

export type DeleteUserResult = {
  deleted_user: UserRecord;
  removed_assets: string[];
  failed_assets: AssetDeleteFailure[];
  reason: string;
  warning: string;
};

export type PhotoDeleteResult = {
  user: UserRecord;
  removed_assets: string[];
  failed_assets: AssetDeleteFailure[];
};

export type PhotoRefreshResult = {
  user: UserRecord;
  url: string;
  expires_in: number;
};

export type NicknameCheckResult = {
  nickname: string;
  valid: boolean;
  available: boolean;
  reason?: string;
  message?: string;
};

export class UserService {
  private readonly users: UserRepository;
  private readonly assets: AssetRepository;
  private readonly images: ImageNormalizer;
  private readonly config: ServiceConfig;
  private readonly nicknames: NicknameValidator;
  private readonly log: Logger;

  constructor(deps: UserServiceDeps) {
    this.users = deps.users;
    this.assets = deps.assets;
    this.images = deps.images;
    this.config = deps.config;
    this.nicknames = new NicknameValidator(deps.config);
    this.log = (deps.logger ?? rootLogger).child({ component: 'user-service' });
  }

  get accessUrlTtlSeconds(): number {
    return Math.floor(this.config.accessUrlTtlDays * 24 * 60 * 60);
  }

  async createUser(identity: string, nickname: string): Promise<UserRecord> {
    const validation = this.nicknames.validate(nickname);
    if (!validation.ok) {
      throw ServiceError.invalidInput(validation.message, { reason: validation.reason, usage: CREATE_USAGE });
    }

    try {
      // create is never retried here: a retry could turn a real conflict into a false success
      const user = await this.call('users.createIfAbsent', () => this.users.createIfAbsent(identity, nickname));
      this.log.info({ identity, nickname }, 'User created');
      return user;
    } catch (error) {
      if (error instanceof RecordStoreError && error.code === 'already_exists') {
        const existing = await this.call('users.get', () => this.users.get(identity));
        throw new ServiceError('conflict', 'User already exists', {
          reason: 'user_exists',
          details: existing ? { user: existing } : { identity },
        });
      }
      if (error instanceof RecordStoreError && error.code === 'nickname_taken') {
        throw new ServiceError('conflict', 'Nickname already taken', {
          reason: 'nickname_taken',
          details: { nickname },
        });
      }
      throw error;
    }
  }

  async getUser(identity: string): Promise<UserRecord> {
    const user = await this.call('users.get', () => this.users.get(identity));
    if (!user) throw ServiceError.notFound('User not found', { user_id: identity });
    return user;
  }

  async lookupByNickname(nickname: string): Promise<UserRecord> {
    const validation = this.nicknames.validate(nickname, { checkReserved: false });
    if (!validation.ok) {
      throw ServiceError.invalidInput(validation.message, { reason: validation.reason });
    }

    const user = await this.call('users.getByNickname', () => this.users.getByNickname(nickname));
    if (!user) throw ServiceError.notFound('User not found', { nickname });
    return user;
  }

  async checkNickname(nickname: string): Promise<NicknameCheckResult> {
    const validation = this.nicknames.validate(nickname);
    if (!validation.ok) {
      return { nickname, valid: false, available: false, reason: validation.reason, message: validation.message };
    }

    const owner = await this.call('users.getByNickname', () => this.users.getByNickname(nickname));
    if (owner) {
      return { nickname, valid: true, available: false, reason: 'nickname_taken', message: 'Nickname already taken' };
    }
    return { nickname, valid: true, available: true };
  }

  async attachPhoto(input: PhotoAttachInput): Promise<PhotoAttachResult> {
    const { identity } = input;
    this.assertSelf(identity, input.requestingIdentity, 'Unauthorized to upload photo for this user');

    const existing = await this.call('users.get', () => this.users.get(identity));
    if (!existing && !input.nicknameForNewUser) {
      throw ServiceError.notFound('User not found. Please provide a nickname for first-time upload.', {
        user_id: identity,
      });
    }

    // a rejected image must not leave a freshly created user behind
    const image = await this.normalize(input.image);

    let created = false;
    if (!existing && input.nicknameForNewUser) {
      created = await this.materializeUser(identity, input.nicknameForNewUser);
    }

    const previous = await this.listForCleanup(identity);

    // new asset goes in before anything is removed: a failure keeps the previous photo
    const asset = await this.call('assets.put', () =>
      this.assets.put(identity, image.data, image.contentType, {
        user_id: identity,
        original_size: String(image.originalSize),
        optimized_size: String(image.outputSize),
      })
    );

    let updated: UserRecord;
    try {
      updated = await this.call('users.setImageUrl', () =>
        this.users.setImageUrl(identity, { url: asset.accessUrl, key: asset.key })
      );
    } catch (error) {
      await this.compensateAssetWrite(identity, asset.key, error);
      if (error instanceof RecordStoreError && error.code === 'not_found') {
        throw ServiceError.notFound('User not found', { user_id: identity });
      }
      throw error;
    }

    const staleKeys = previous.keys.filter((key) => key !== asset.key);
    const old_assets = await this.deleteBestEffort(identity, staleKeys, 'old photo cleanup', previous.failed);

    this.log.info(
      { identity, key: asset.key, created, reduction: image.reductionPercent, removed: old_assets.deleted.length },
      'Photo attached'
    );

    return {
      user: updated,
      created,
      photo: {
        key: asset.key,
        url: asset.accessUrl,
        width: image.width,
        height: image.height,
        content_type: image.contentType,
        original_size: image.originalSize,
        output_size: image.outputSize,
        reduction_percent: image.reductionPercent,
      },
      old_assets,
    };
  }

  async deletePhoto(identity: string, requestingIdentity?: string): Promise<PhotoDeleteResult> {
    this.assertSelf(identity, requestingIdentity, 'Unauthorized: You can only delete your own photos');

    const user = await this.getUser(identity);
    if (!user.image_key && !user.image_url) {
      return { user, removed_assets: [], failed_assets: [] };
    }

    // record first: a leftover object is a leak, a record pointing at nothing is a broken profile
    let cleared: UserRecord;
    try {
      cleared = await this.call('users.setImageUrl', () => this.users.setImageUrl(identity, null));
    } catch (error) {
      if (error instanceof RecordStoreError && error.code === 'not_found') {
        throw ServiceError.notFound('User not found', { user_id: identity });
      }
      throw error;
    }

    const listing = await this.listForCleanup(identity);
    const result = await this.deleteBestEffort(identity, listing.keys, 'photo delete', listing.failed);
    return { user: cleared, removed_assets: result.deleted, failed_assets: result.failed };
  }

  async refreshPhotoUrl(identity: string, requestingIdentity?: string): Promise<PhotoRefreshResult> {
    this.assertSelf(identity, requestingIdentity, 'Unauthorized: You can only refresh your own photo URLs');

    const user = await this.getUser(identity);
    const key = user.image_key;
    if (!key) throw ServiceError.notFound('No photos found for this user', { user_id: identity });

    const exists = await this.call('assets.exists', () => this.assets.exists(key));
    if (!exists) throw ServiceError.notFound('Photo file not found in storage', { user_id: identity, key });

    const ttl = this.accessUrlTtlSeconds;
    const url = await this.call('assets.issueAccessUrl', () => this.assets.issueAccessUrl(key, ttl));

    let updated: UserRecord;
    try {
      updated = await this.call('users.setImageUrl', () => this.users.setImageUrl(identity, { url, key }));
    } catch (error) {
      if (error instanceof RecordStoreError && error.code === 'not_found') {
        throw ServiceError.notFound('User not found', { user_id: identity });
      }
      throw error;
    }

    return { user: updated, url, expires_in: ttl };
  }

  async deleteUser(input: DeleteUserInput): Promise<DeleteUserResult> {
    const { identity } = input;
    if (!input.confirm) {
      throw ServiceError.invalidInput('Account deletion requires confirmation', {
        reason: 'confirmation_required',
        usage: DELETE_USAGE,
        details: { warning: DELETE_WARNING },
      });
    }
    this.assertSelf(identity, input.requestingIdentity, 'Unauthorized: You can only delete your own account');

    let deleted: UserRecord;
    try {
      deleted = await this.call('users.delete', () => this.users.delete(identity));
    } catch (error) {
      if (error instanceof RecordStoreError && error.code === 'not_found') {
        throw ServiceError.notFound('User not found', { user_id: identity });
      }
      throw error;
    }

    const listing = await this.listForCleanup(identity);
    const cleanup = await this.deleteBestEffort(identity, listing.keys, 'account delete', listing.failed);

    const reason = input.reason?.trim() || DEFAULT_DELETION_REASON;
    this.log.info({ identity, removed: cleanup.deleted.length, failed: cleanup.failed.length, reason }, 'User deleted');

    return {
      deleted_user: deleted,
      removed_assets: cleanup.deleted,
      failed_assets: cleanup.failed,
      reason,
      warning: DELETE_WARNING,
    };
  }

  private assertSelf(target: string, requester: string | undefined, message: string): void {
    if (requester !== undefined && requester !== target) {
      throw ServiceError.forbidden(message, { token_user_id: requester, target_user_id: target });
    }
  }

  /** Returns false when a concurrent request created the same identity first. */
  private async materializeUser(identity: string, nickname: string): Promise<boolean> {
    try {
      await this.createUser(identity, nickname);
      return true;
    } catch (error) {
      if (error instanceof ServiceError && error.reason === 'user_exists') return false;
      throw error;
    }
  }

  private async normalize(bytes: Buffer): Promise<NormalizedImage> {
    try {
      return await this.images.normalize(bytes, {
        maxBytes: this.config.maxImageBytes,
        maxWidth: this.config.maxWidth,
        maxHeight: this.config.maxHeight,
        outputQuality: this.config.jpegQuality,
      });
    } catch (error) {
      if (error instanceof ImageError) {
        throw ServiceError.invalidInput(error.message, { reason: error.code, details: error.details });
      }
      throw error;
    }
  }

  /**
   * A listing failure is reported as one `ListFailed` entry for the whole prefix,
   * so callers can tell that objects may remain.
   */
  private async listForCleanup(identity: string): Promise<{ keys: string[]; failed: AssetDeleteFailure[] }> {
    try {
      const objects = await this.call('assets.listByPrefix', () => this.assets.listByPrefix(identity));
      return { keys: objects.map((object) => object.key), failed: [] };
    } catch (error) {
      this.log.warn({ identity, error: describeError(error) }, 'Could not list photo assets; cleanup skipped');
      return {
        keys: [],
        failed: [{ key: assetPrefix(identity), code: 'ListFailed', message: describeError(error) }],
      };
    }
  }

  private async deleteBestEffort(
    identity: string,
    keys: string[],
    purpose: string,
    listingFailures: AssetDeleteFailure[] = []
  ): Promise<{ deleted: string[]; failed: AssetDeleteFailure[] }> {
    if (keys.length === 0) return { deleted: [], failed: [...listingFailures] };

    try {
      const result = await this.call('assets.deleteMany', () => this.assets.deleteMany(keys));
      if (result.failed.length > 0) {
        this.log.warn({ identity, purpose, failed: result.failed }, 'Some photo assets were not removed');
      }
      return { deleted: result.deleted, failed: [...listingFailures, ...result.failed] };
    } catch (error) {
      this.log.warn({ identity, purpose, keys, error: describeError(error) }, 'Photo asset cleanup failed');
      return {
        deleted: [],
        failed: [
          ...listingFailures,
          ...keys.map((key) => ({ key, code: 'CleanupFailed', message: describeError(error) })),
        ],
      };
    }
  }

  private async compensateAssetWrite(identity: string, key: string, cause: unknown): Promise<void> {
    let failure: string | undefined;
    try {
      const result = await this.call('assets.deleteMany', () => this.assets.deleteMany([key]));
      const failed = result.failed.find((item) => item.key === key);
      if (failed) failure = `${failed.code}: ${failed.message}`;
    } catch (error) {
      failure = describeError(error);
    }

    if (failure === undefined) {
      this.log.warn({ identity, key, error: describeError(cause) }, 'Record update failed; removed the new photo');
      return;
    }

    this.log.error(
      { identity, key, error: describeError(cause), compensation: failure },
      'Record update failed and the new photo could not be removed; manual cleanup required'
    );
    throw new ServiceError('internal', 'Photo update failed and the uploaded file could not be removed', {
      category: 'correctness',
      retryable: false,
      details: { user_id: identity, orphaned_key: key, cause: describeError(cause), compensation_error: failure },
      cause,
    });
  }

  private async call<T>(operation: string, work: () => Promise<T>): Promise<T> {
    try {
      return await withTimeout(operation, this.config.externalCallTimeoutMs, work);
    } catch (error) {
      if (error instanceof ServiceError || error instanceof RecordStoreError) throw error;
      this.log.error({ operation, err: error }, 'External call failed');
      throw ServiceError.internal(operation, error);
    }
  }
}
