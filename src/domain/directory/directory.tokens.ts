/**
 * NestJS injection token for the directory gateway.
 *
 * Usage:
 *   @Inject(DIRECTORY_GATEWAY) private readonly directory: IDirectoryGateway
 */
export const DIRECTORY_GATEWAY = 'DIRECTORY_GATEWAY';
