import type { Env } from '@replykit/infra-kit'
import type { ActorProfile, Membership } from '../types'
import { env } from '@replykit/infra-kit'
import { Permission, PermissionState } from './Permission'

export interface PermissionEvaluatorOptions {
  /** 角色 ID → 权限等级 */
  roleTiers?: ReadonlyMap<string, Permission>
  /** 视为机器人所有者的用户 ID */
  ownerIds?: Iterable<string>
}

/**
 * 权限判定
 *
 * 有效等级 = max(成员角色对应等级, 用户设置中的显式授权)；
 * 成员或设置缺失时按最低等级处理，不抛出异常
 */
export class PermissionEvaluator {
  private readonly roleTiers: ReadonlyMap<string, Permission>
  private readonly ownerIds: ReadonlySet<string>

  constructor(options: PermissionEvaluatorOptions = {}) {
    this.roleTiers = options.roleTiers ?? new Map()
    this.ownerIds = new Set(options.ownerIds ?? [])
  }

  static fromEnv(config: Pick<Env, 'ADMIN_ROLE_IDS' | 'MODERATOR_ROLE_IDS' | 'BOT_OWNERS'> = env): PermissionEvaluator {
    const roleTiers = new Map<string, Permission>()
    for (const id of config.MODERATOR_ROLE_IDS)
      roleTiers.set(id, Permission.MODERATOR)
    // 同一角色同时出现在两个列表时取较高等级
    for (const id of config.ADMIN_ROLE_IDS)
      roleTiers.set(id, Permission.ADMIN)
    return new PermissionEvaluator({ roleTiers, ownerIds: config.BOT_OWNERS })
  }

  evaluate(requirement: Permission, membership?: Membership, profile?: ActorProfile): PermissionState {
    return this.effectiveTier(membership, profile) >= requirement
      ? PermissionState.ACCEPTED
      : PermissionState.REJECTED
  }

  effectiveTier(membership?: Membership, profile?: ActorProfile): Permission {
    return Math.max(this.membershipTier(membership), this.profileTier(membership, profile))
  }

  private membershipTier(membership?: Membership): Permission {
    let tier = Permission.NONE
    for (const roleId of membership?.roleIds ?? []) {
      tier = Math.max(tier, this.roleTiers.get(roleId) ?? Permission.NONE)
    }
    return tier
  }

  private profileTier(membership?: Membership, profile?: ActorProfile): Permission {
    const actorId = profile?.actorId ?? membership?.actorId
    if (actorId !== undefined && this.ownerIds.has(actorId))
      return Permission.BOT_OWNER
    return profile?.permissionOverride ?? Permission.NONE
  }
}
