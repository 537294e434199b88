import type { OutgoingPayload, SentMessage } from '@replykit/message-kit'
import type { Mock } from 'vitest'
import type { CommandContext } from '../handlers/CommandContext'
import type { Command, Invocation, ResolvedChannel } from '../types'
import { beforeEach, describe, expect, it, vi } from 'vitest'
import { CommandClient } from '../CommandClient'
import { Permission } from '../services/Permission'
import { PermissionEvaluator } from '../services/PermissionEvaluator'
import { ResponseTracker } from '../services/ResponseTracker'
import { Arguments } from '../utils/Arguments'

vi.mock('@replykit/infra-kit', () => ({
  getLogger: vi.fn(() => ({
    trace: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  })),
  env: {
    ADMIN_ROLE_IDS: [],
    MODERATOR_ROLE_IDS: [],
    BOT_OWNERS: [],
    COMMAND_PREFIX: '!',
    HOME_SCOPE_ID: 'home-env',
  },
}))

const invocation: Invocation = {
  messageId: 'msg-1',
  channel: { id: 'chan-1', type: 'scope' },
  actor: { id: 'user-1', name: 'TestUser' },
  membership: { actorId: 'user-1', scopeId: 'scope-1', roleIds: [] },
}

function createCommand(permission: Permission, execute: (ctx: CommandContext) => Promise<void>): Command {
  return { name: 'purge', description: 'purge messages', permission, execute }
}

describe('commandClient', () => {
  let seq: number
  let sendToChannel: Mock<(channel: ResolvedChannel, payload: OutgoingPayload) => Promise<SentMessage>>
  let deleteMessage: Mock<(channelId: string, messageId: string) => Promise<void>>
  let client: CommandClient

  beforeEach(() => {
    seq = 0
    sendToChannel = vi.fn(async (channel: ResolvedChannel, _payload: OutgoingPayload): Promise<SentMessage> => {
      seq++
      return { channelId: channel.id, messageId: `reply-${seq}` }
    })
    deleteMessage = vi.fn(async (_channelId: string, _messageId: string) => {})
    client = new CommandClient({
      transport: { sendToChannel, deleteMessage },
      directory: {
        resolveScope: vi.fn(async () => ({ id: 'scope-1' })),
        resolveMembership: vi.fn(async () => undefined),
      },
      profiles: {
        getProfile: vi.fn(async (actorId: string) => ({ actorId })),
      },
      evaluator: new PermissionEvaluator({ ownerIds: ['owner-1'] }),
    })
  })

  it('creates one tracker per client and shares it with contexts', async () => {
    const shared = new ResponseTracker()
    const withShared = new CommandClient({
      transport: { sendToChannel, deleteMessage },
      directory: { resolveScope: vi.fn(async () => ({ id: 'scope-1' })), resolveMembership: vi.fn(async () => undefined) },
      profiles: { getProfile: vi.fn(async (actorId: string) => ({ actorId })) },
      evaluator: new PermissionEvaluator(),
      tracker: shared,
    })

    const ctx = await withShared.createContext(invocation, createCommand(Permission.NONE, async () => {}))
    await ctx.respond('hi')

    expect(withShared.tracker).toBe(shared)
    expect(shared.getResponses('msg-1')).toHaveLength(1)
    expect(client.tracker).not.toBe(shared)
  })

  it('runs the command when the actor has the required permission', async () => {
    const execute = vi.fn(async (ctx: CommandContext) => {
      await ctx.respond(`purging ${ctx.args.join()}`)
    })

    const result = await client.execute(invocation, createCommand(Permission.NONE, execute), new Arguments(['10']))

    expect(result).toBe('executed')
    expect(execute).toHaveBeenCalledTimes(1)
    expect(sendToChannel).toHaveBeenCalledWith(
      { id: 'chan-1', type: 'scope', scopeId: 'scope-1' },
      { type: 'text', content: 'purging 10', allowedMentions: { deny: ['everyone', 'here'] } },
    )
    expect(client.tracker.getResponses('msg-1')).toHaveLength(1)
  })

  it('rejects with an error embed when permission is missing', async () => {
    const execute = vi.fn(async () => {})

    const result = await client.execute(invocation, createCommand(Permission.ADMIN, execute))

    expect(result).toBe('rejected')
    expect(execute).not.toHaveBeenCalled()
    expect(sendToChannel).toHaveBeenCalledWith(
      { id: 'chan-1', type: 'scope', scopeId: 'scope-1' },
      {
        type: 'embed',
        embed: {
          title: '❌ 权限不足',
          description: '该命令需要「管理员」权限',
          color: 0xE74C3C,
          fields: [],
        },
      },
    )
    expect(client.tracker.getResponses('msg-1')).toHaveLength(1)
  })

  it('rethrows handler failures', async () => {
    const failure = new Error('boom')

    await expect(client.execute(invocation, createCommand(Permission.NONE, async () => {
      throw failure
    }))).rejects.toBe(failure)
  })

  it('falls back to HOME_SCOPE_ID for private invocations', async () => {
    const resolveMembership = vi.fn(async () => undefined)
    const fromEnv = new CommandClient({
      transport: { sendToChannel, deleteMessage },
      directory: { resolveScope: vi.fn(async () => undefined), resolveMembership },
      profiles: { getProfile: vi.fn(async (actorId: string) => ({ actorId })) },
      evaluator: new PermissionEvaluator(),
    })

    const ctx = await fromEnv.createContext(
      { ...invocation, channel: { id: 'dm-1', type: 'private' }, membership: undefined },
      createCommand(Permission.NONE, async () => {}),
    )

    expect(ctx.scope).toEqual({ id: 'home-env' })
    expect(resolveMembership).toHaveBeenCalledWith('user-1', { id: 'home-env' })
  })

  it('still runs unprivileged commands when the membership lookup fails', async () => {
    const failing = new CommandClient({
      transport: { sendToChannel, deleteMessage },
      directory: {
        resolveScope: vi.fn(async () => undefined),
        resolveMembership: vi.fn(async () => {
          throw new Error('Unknown Member')
        }),
      },
      profiles: { getProfile: vi.fn(async (actorId: string) => ({ actorId })) },
      evaluator: new PermissionEvaluator(),
    })
    const execute = vi.fn(async (ctx: CommandContext) => {
      await ctx.respond(ctx.hasAdmin() ? 'admin' : 'guest')
    })

    const result = await failing.execute(
      { ...invocation, channel: { id: 'dm-1', type: 'private' }, membership: undefined },
      createCommand(Permission.NONE, execute),
    )

    expect(result).toBe('executed')
    expect(sendToChannel).toHaveBeenCalledWith(
      { id: 'dm-1', type: 'private' },
      { type: 'text', content: 'guest', allowedMentions: { deny: ['everyone', 'here'] } },
    )
  })

  describe('handleInvocationDeleted', () => {
    it('deletes every tracked response of the invocation', async () => {
      const ctx = await client.createContext(invocation, createCommand(Permission.NONE, async () => {}))
      await ctx.respond('one')
      await ctx.respond('two')

      const deleted = await client.handleInvocationDeleted('msg-1')

      expect(deleted).toBe(2)
      expect(deleteMessage.mock.calls).toEqual([
        ['chan-1', 'reply-1'],
        ['chan-1', 'reply-2'],
      ])
      expect(client.tracker.has('msg-1')).toBe(false)
    })

    it('does nothing for untracked invocations', async () => {
      await expect(client.handleInvocationDeleted('unknown')).resolves.toBe(0)
      expect(deleteMessage).not.toHaveBeenCalled()
    })

    it('attempts every deletion and reports failures together', async () => {
      client.tracker.register('msg-2', 'chan-1', 'a')
      client.tracker.register('msg-2', 'chan-1', 'b')
      deleteMessage.mockRejectedValueOnce(new Error('missing'))

      await expect(client.handleInvocationDeleted('msg-2')).rejects.toBeInstanceOf(AggregateError)
      expect(deleteMessage).toHaveBeenCalledTimes(2)
    })
  })
})
