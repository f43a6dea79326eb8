import { closeTestContext, createTestContext, type TestContext } from './helpers/app.helper';
import { seedTenant, ticketText } from './helpers/fixtures';
import { EXIT_CODE } from '@app/modules/app/ticket-runner.service';

describe('Provision ticket (E2E)', () => {
  let ctx: TestContext;

  afterEach(async () => {
    await closeTestContext(ctx, { ALTERNATE_NAME_DECISION: '' });
  });

  describe('new user', () => {
    beforeEach(async () => {
      ctx = await createTestContext();
      seedTenant(ctx.directory);
    });

    it('should provision the user and report every step', async () => {
      const outcome = await ctx.runner.run(ticketText());

      const [created] = await ctx.directory.findUsersByPrincipalName('John.Doe@example.com');
      expect(created).toBeDefined();
      expect(outcome.exitCode).toBe(EXIT_CODE.COMPLETE);
      expect(outcome.report).toBe(
        [
          'Provisioning complete: John Doe',
          '  Principal name : John.Doe@example.com',
          `  Directory id   : ${created.id}`,
          '  Office         : Plant 2',
          '  Auth phone     : +1 5551234567',
          '',
          'Steps',
          '  [ok]   phone    +1 5551234567',
          '  [ok]   manager  Jane Doe',
          '  [FAIL] groups   4 of 5 groups added',
          '  [FAIL] license  1 of 2 licenses assigned',
          '',
          'Groups',
          '  [ok]   Engineering Team',
          '  [ok]   CNC Group',
          '  [ok]   All Staff',
          '  [ok]   Shop Floor Announcements',
          '  [FAIL] CAD Share Users: Group not found',
          '',
          'Licenses',
          '  [ok]   Microsoft 365 F3',
          '  [FAIL] Visio Plan 2: Exhausted: all 2 seats in use',
          '',
          'Finish manually: groups, license',
          '',
        ].join('\n'),
      );
    });

    it('should write the ticket fields onto the directory user', async () => {
      await ctx.runner.run(ticketText());

      const [created] = await ctx.directory.findUsersByPrincipalName('John.Doe@example.com');
      expect(ctx.directory.getCreateInput(created.id)).toMatchObject({
        givenName: 'John',
        surname: 'Doe',
        jobTitle: 'CNC Machinist',
        department: 'Engineering',
        officeLocation: 'Plant 2',
        usageLocation: 'US',
        passwordProfile: { password: 'test-password', forceChangePasswordNextSignIn: true },
      });
      expect(ctx.directory.getManagerId(created.id)).toBe('mgr-jane');
      expect(ctx.directory.getAssignedSkuIds(created.id)).toEqual(['sku-f1']);
    });

    it('should read groups given on separate lines like an inline list', async () => {
      await ctx.runner.run(ticketText({ groups: ['Engineering Team.', 'CNC Group;'] }));

      const [created] = await ctx.directory.findUsersByPrincipalName('John.Doe@example.com');
      const memberOf = ['Engineering Team', 'CNC Group'];
      for (const name of memberOf) {
        const [group] = await ctx.directory.findGroupsByDisplayName(name);
        expect(ctx.directory.getGroupMembers(group.id)).toEqual([created.id]);
      }
    });

    it('should collapse compound names and strip diacritics in the principal name', async () => {
      const outcome = await ctx.runner.run(ticketText({ firstName: 'José', lastName: "O'hara" }));

      expect(outcome.exitCode).toBe(EXIT_CODE.COMPLETE);
      expect(outcome.report).toContain('  Principal name : Jose.Ohara@example.com\n');
    });

    it('should fail on a ticket without a last name', async () => {
      const outcome = await ctx.runner.run(ticketText({ lastName: '' }));

      expect(outcome.exitCode).toBe(EXIT_CODE.FATAL);
      expect(outcome.report).toBe(
        'Provisioning failed (InvalidTicket): Ticket has no last name; found fields: ' +
          'First Name, Last Name, Job Title, Manager, Division, Personal Phone, Department, ' +
          'Office Location, Groups / Distribution Lists, Additional Notes.\n',
      );
    });
  });

  describe('principal name already taken', () => {
    it('should abort when the operator declines', async () => {
      ctx = await createTestContext({ ALTERNATE_NAME_DECISION: 'decline' });
      seedTenant(ctx.directory);
      ctx.directory.seedUser({ displayName: 'John Doe', userPrincipalName: 'John.Doe@example.com' });

      const outcome = await ctx.runner.run(ticketText());

      expect(outcome.exitCode).toBe(EXIT_CODE.ABORTED);
      expect(outcome.report).toBe(
        'Provisioning aborted: the principal name is already in use by\n' +
          '  - John Doe <John.Doe@example.com>\n' +
          'No user was created.\n',
      );
      expect(await ctx.directory.findUsersByPrincipalName('John.Doe1@example.com')).toEqual([]);
    });

    it('should use the alternate name when configured to accept', async () => {
      ctx = await createTestContext({ ALTERNATE_NAME_DECISION: 'accept' });
      seedTenant(ctx.directory);
      ctx.directory.seedUser({ displayName: 'John Doe', userPrincipalName: 'John.Doe@example.com' });

      const outcome = await ctx.runner.run(ticketText());

      expect(outcome.exitCode).toBe(EXIT_CODE.COMPLETE);
      expect(outcome.report).toContain('  Principal name : John.Doe1@example.com\n');
    });

    it('should fail when the alternate name is taken too', async () => {
      ctx = await createTestContext({ ALTERNATE_NAME_DECISION: 'accept' });
      seedTenant(ctx.directory);
      ctx.directory.seedUser({ displayName: 'John Doe', userPrincipalName: 'John.Doe@example.com' });
      ctx.directory.seedUser({ displayName: 'John Doe', userPrincipalName: 'John.Doe1@example.com' });

      const outcome = await ctx.runner.run(ticketText());

      expect(outcome.exitCode).toBe(EXIT_CODE.FATAL);
      expect(outcome.report).toBe(
        'Provisioning failed (Unresolvable): Both John.Doe@example.com and its alternate John.Doe1@example.com are already in use.\n',
      );
    });
  });
});
