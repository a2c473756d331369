import { Injectable } from '@nestjs/common';
import { AccessDeniedException } from '../common/errors';
import { WorkspaceMembership } from '../common/entities/membership.entity';
import { canPerform, WorkspaceAction } from '../common/permissions';
import { MembersRepository } from './members.repository';

/**
 * Resolves the caller's membership and checks it against the role an
 * action requires. A caller with no membership gets the same error as one
 * with too low a role, so workspace existence is not revealed.
 */
@Injectable()
export class WorkspaceAccessService {
  constructor(private readonly members: MembersRepository) {}

  async authorize(
    workspaceId: string,
    userId: string,
    action: WorkspaceAction,
  ): Promise<WorkspaceMembership> {
    const membership = await this.members.find(workspaceId, userId);
    if (!membership || !canPerform(membership.role, action)) {
      throw new AccessDeniedException();
    }
    return membership;
  }
}
