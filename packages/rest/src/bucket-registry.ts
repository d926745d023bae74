// packages/rest/src/bucket-registry.ts
import type { MajorParams, RateLimitInfo } from '@gatecord/types';
import { getEventBus, type GatecordLogger } from '@gatecord/infra';
import { Bucket } from './bucket.js';
import { getBucketKey } from './route.js';

export interface BucketRegistryDeps {
  now?: () => number;
  logger?: GatecordLogger;
}

/**
 * 버킷 레지스트리
 *
 * 버킷 ID를 모르는 동안은 라우트 키로, 알게 된 뒤에는 ID로 키를 만든다.
 * 라우트 키 → 버킷 ID 매핑은 한 번 배우면 같은 라우트의 다른 메이저 파라미터에도 쓰인다.
 *
 * 임시 키(라우트 + 메이저)마다 살아 있는 버킷을 별칭으로 기억한다.
 * 요청이 나가 있는 임시 버킷이 있으면 ID를 배운 뒤에도 그 버킷에 줄을 세운다.
 * ID 키가 이미 있는 상태로 마이그레이션하면 기존 버킷을 새 버킷에 병합한다.
 */
export class BucketRegistry {
  private readonly buckets = new Map<string, Bucket>();
  /** 임시 키 → 버킷 */
  private readonly aliases = new Map<string, Bucket>();
  /** 키에서 빠졌지만 대기자가 남은 병합 버킷까지 포함 */
  private readonly all = new Set<Bucket>();
  private readonly routeBuckets = new Map<string, string>();
  private readonly now: () => number;
  private readonly logger: GatecordLogger | undefined;

  constructor(deps: BucketRegistryDeps = {}) {
    this.now = deps.now ?? Date.now;
    this.logger = deps.logger;
  }

  get size(): number {
    return this.buckets.size;
  }

  get(key: string): Bucket | undefined {
    return this.buckets.get(key);
  }

  /** 알려진 라우트 → 버킷 ID */
  getBucketId(routeKey: string): string | undefined {
    return this.routeBuckets.get(routeKey);
  }

  /** 라우트 + 메이저 파라미터에 해당하는 버킷 (없으면 생성) */
  resolve(routeKey: string, major: MajorParams): Bucket {
    const provisionalKey = getBucketKey(routeKey, major);
    const aliased = this.aliases.get(provisionalKey)?.live;
    if (aliased && this.buckets.get(aliased.key) === aliased) {
      return aliased;
    }

    const bucketId = this.routeBuckets.get(routeKey);
    const key = bucketId === undefined ? provisionalKey : getBucketKey(bucketId, major);
    let bucket = this.buckets.get(key);
    if (!bucket) {
      bucket = new Bucket(key, routeKey, major, {
        now: this.now,
        onExpire: (expired) => this.remove(expired),
      });
      this.buckets.set(key, bucket);
      this.all.add(bucket);
    }
    this.aliases.set(provisionalKey, bucket);
    return bucket;
  }

  /** 헤더 반영 + 최초 버킷 ID 공개 시 마이그레이션 */
  update(bucket: Bucket, info: RateLimitInfo): void {
    bucket.update(info);
    if (info.bucket !== undefined && bucket.bucketId === undefined) {
      this.migrate(bucket, info.bucket);
    }
  }

  /** 모든 타이머 취소, 대기자 정리 */
  close(): void {
    for (const bucket of this.all) {
      bucket.dispose();
    }
    this.all.clear();
    this.buckets.clear();
    this.aliases.clear();
    this.routeBuckets.clear();
  }

  private migrate(bucket: Bucket, bucketId: string): void {
    bucket.bucketId = bucketId;
    this.routeBuckets.set(bucket.routeKey, bucketId);

    const newKey = getBucketKey(bucketId, bucket.major);
    // 이미 병합된 버킷은 대상이 키를 대표한다
    if (newKey === bucket.key || bucket.mergedInto) {
      return;
    }
    const oldKey = bucket.key;
    if (this.buckets.get(oldKey) === bucket) {
      this.buckets.delete(oldKey);
    }
    const existing = this.buckets.get(newKey);
    bucket.key = newKey;
    this.buckets.set(newKey, bucket);
    if (existing) {
      // 같은 스코프: 기존 버킷의 대기자는 이 버킷의 진행 중 요청 뒤로 선다
      this.logger?.debug(`Bucket ${oldKey} merged with existing ${newKey}`);
      existing.mergeInto(bucket);
    }
    getEventBus().emit('rest:bucket:migrate', oldKey, newKey);
  }

  private remove(bucket: Bucket): void {
    this.all.delete(bucket);
    if (this.buckets.get(bucket.key) === bucket) {
      this.buckets.delete(bucket.key);
    }
    for (const [key, aliased] of this.aliases) {
      if (aliased === bucket) {
        this.aliases.delete(key);
      }
    }
  }
}
