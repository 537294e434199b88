/**
 * 权限等级，数值越大权限越高
 */
export enum Permission {
  NONE = 0,
  MODERATOR = 1,
  ADMIN = 2,
  BOT_OWNER = 3,
}

export enum PermissionState {
  ACCEPTED = 'accepted',
  REJECTED = 'rejected',
}

export const PERMISSION_LABELS: Record<Permission, string> = {
  [Permission.NONE]: '所有人',
  [Permission.MODERATOR]: '版主',
  [Permission.ADMIN]: '管理员',
  [Permission.BOT_OWNER]: '机器人所有者',
}
