import { createEnvelope, Email, HandlerContext, Transports, UserId } from '../../../domain';
import { ErrorCode } from '../../../utils/exceptions';
import { createTestHarness, TEST_APP_NAME, TestHarness } from '../../helpers/fakes';

function dispatchUsers(
  harness: TestHarness,
  payload: Record<string, unknown>,
  context: Partial<HandlerContext>
) {
  return harness.app.commandBus.dispatch(createEnvelope(Transports.HTTP, 'users', payload, context));
}

describe('users', () => {
  let harness: TestHarness;

  beforeEach(() => {
    harness = createTestHarness();
  });

  async function createJohn() {
    return harness.app.services.usersService.createUser({
      name: 'John Doe',
      email: 'john@example.com',
      age: 30,
      metadata: { plan: 'free' },
    });
  }

  describe('create', () => {
    it('creates the user, queues a welcome notification and publishes user.created', async () => {
      const result = await dispatchUsers(
        harness,
        { name: 'John Doe', email: 'john@example.com', age: 30 },
        { operation: 'create' }
      );

      expect(result.success).toBe(true);
      expect(result.data).toMatchObject({ name: 'John Doe', email: 'john@example.com', age: 30 });

      const stored = await harness.users.getByEmail(new Email('john@example.com'));
      expect(stored).not.toBeNull();

      const welcome = harness.notifications.list();
      expect(welcome).toHaveLength(1);
      expect(welcome[0].recipient.value).toBe('john@example.com');
      expect(welcome[0].status).toBe('pending');
      expect(welcome[0].metadata).toEqual({ type: 'welcome' });
      expect(welcome[0].content.subject).toBe(`Welcome to ${TEST_APP_NAME}!`);
      expect(welcome[0].content.body).toBe('Hello John Doe, welcome to our platform!');
      expect(welcome[0].userId?.value).toBe(stored?.id.value);

      const created = harness.events.ofType('user.created');
      expect(created).toHaveLength(1);
      expect(created[0].payload).toEqual({
        user_id: stored?.id.value,
        name: 'John Doe',
        email: 'john@example.com',
      });
    });

    it('defaults to create when no sub-operation is given', async () => {
      const result = await dispatchUsers(harness, { name: 'Ann', email: 'ann@example.com' }, {});

      expect(result.success).toBe(true);
      expect(harness.users.size).toBe(1);
    });

    it('rejects a duplicate email and leaves the first user untouched', async () => {
      await createJohn();

      const result = await dispatchUsers(
        harness,
        { name: 'Impostor', email: 'john@example.com' },
        { operation: 'create' }
      );

      expect(result.success).toBe(false);
      expect(result.errorCode).toBe(ErrorCode.ALREADY_EXISTS);
      expect(result.message).toBe('User with email=john@example.com already exists');
      expect(harness.users.size).toBe(1);

      const stored = await harness.users.getByEmail(new Email('john@example.com'));
      expect(stored?.name.value).toBe('John Doe');
      expect(harness.events.ofType('user.created')).toHaveLength(1);
    });

    it('reports a missing email as a validation error', async () => {
      const result = await dispatchUsers(harness, { name: 'No Email' }, { operation: 'create' });

      expect(result.errorCode).toBe(ErrorCode.VALIDATION_ERROR);
      expect(result.message).toBe('email: Required');
      expect(harness.users.size).toBe(0);
    });

    it('rejects a malformed email', async () => {
      const result = await dispatchUsers(
        harness,
        { name: 'Bad', email: 'not-an-email' },
        { operation: 'create' }
      );

      expect(result.errorCode).toBe(ErrorCode.VALIDATION_ERROR);
      expect(harness.notifications.list()).toHaveLength(0);
    });

    it('still creates the user when the welcome notification cannot be stored', async () => {
      jest.spyOn(harness.notifications, 'create').mockRejectedValueOnce(new Error('disk full'));

      const result = await dispatchUsers(
        harness,
        { name: 'John Doe', email: 'john@example.com' },
        { operation: 'create' }
      );

      expect(result.success).toBe(true);
      expect(harness.users.size).toBe(1);
      expect(harness.events.ofType('user.created')).toHaveLength(1);
    });
  });

  describe('update', () => {
    it('changes only the metadata when only metadata is sent', async () => {
      const user = await createJohn();

      const result = await dispatchUsers(
        harness,
        { metadata: { team: 'core' } },
        { operation: 'update', userId: user.id.value }
      );

      expect(result.success).toBe(true);
      const stored = await harness.users.getById(user.id);
      expect(stored?.name.value).toBe('John Doe');
      expect(stored?.age?.value).toBe(30);
      expect(stored?.metadata).toEqual({ plan: 'free', team: 'core' });

      const updated = harness.events.ofType('user.updated');
      expect(updated).toHaveLength(1);
      expect(updated[0].payload).toEqual({
        user_id: user.id.value,
        changes: { metadata: { team: 'core' } },
      });
    });

    it('applies name and age changes', async () => {
      const user = await createJohn();

      await dispatchUsers(
        harness,
        { name: 'Johnny', age: 31 },
        { operation: 'update', userId: user.id.value }
      );

      const stored = await harness.users.getById(user.id);
      expect(stored?.name.value).toBe('Johnny');
      expect(stored?.age?.value).toBe(31);
      expect(harness.events.ofType('user.updated')[0].payload).toEqual({
        user_id: user.id.value,
        changes: { name: 'Johnny', age: 31 },
      });
    });

    it('returns NOT_FOUND for an unknown user', async () => {
      const result = await dispatchUsers(
        harness,
        { name: 'Nobody' },
        { operation: 'update', userId: 'missing-user' }
      );

      expect(result.errorCode).toBe(ErrorCode.NOT_FOUND);
      expect(result.message).toBe('User with ID missing-user not found');
    });

    it('rejects an out-of-range age', async () => {
      const user = await createJohn();

      const result = await dispatchUsers(
        harness,
        { age: 151 },
        { operation: 'update', userId: user.id.value }
      );

      expect(result.errorCode).toBe(ErrorCode.VALIDATION_ERROR);
      expect(result.message).toBe('age: Age cannot exceed 150');
    });
  });

  describe('get and delete', () => {
    it('returns the stored user', async () => {
      const user = await createJohn();

      const result = await dispatchUsers(harness, {}, { operation: 'get', userId: user.id.value });

      expect(result.success).toBe(true);
      expect(result.data).toEqual(user.toDict());
    });

    it('deletes the user and publishes user.deleted', async () => {
      const user = await createJohn();

      const result = await dispatchUsers(harness, {}, { operation: 'delete', userId: user.id.value });

      expect(result.success).toBe(true);
      expect(result.data).toEqual({ user_id: user.id.value });
      expect(await harness.users.getById(new UserId(user.id.value))).toBeNull();
      expect(harness.events.ofType('user.deleted')[0].payload).toEqual({
        user_id: user.id.value,
        email: 'john@example.com',
      });

      const after = await dispatchUsers(harness, {}, { operation: 'get', userId: user.id.value });
      expect(after.errorCode).toBe(ErrorCode.NOT_FOUND);
    });
  });
});
