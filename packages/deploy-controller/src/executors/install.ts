import type { Logger } from "@pyship/shared"
import { InstallError } from "../errors.js"
import { type HostContext, withPrivileges } from "../host.js"
import type { RenderedArtifact } from "../types.js"

export interface InstallOptions {
  logger: Logger
}

/**
 * Write artifacts to their destinations in order, under one privileged session.
 *
 * Files are overwritten, so installing the same artifacts twice leaves the same
 * contents. The first failure stops the run; artifacts written before it stay
 * on disk.
 *
 * @returns destinations written
 * @throws InstallError naming the artifact and path that failed
 */
export async function installArtifacts(
  host: HostContext,
  artifacts: readonly RenderedArtifact[],
  options: InstallOptions,
): Promise<string[]> {
  const { logger } = options
  const written: string[] = []

  let acquired = false
  await withPrivileges(
    host,
    async session => {
      acquired = true
      for (const artifact of artifacts) {
        logger.debug(`Writing ${artifact.kind} to ${artifact.destination}`)
        try {
          await session.writeFile(artifact.destination, artifact.content, {
            mode: artifact.mode,
            owner: artifact.owner,
          })
          if (artifact.link) {
            await session.symlink(artifact.destination, artifact.link)
          }
        } catch (error) {
          throw new InstallError(artifact.kind, artifact.destination, error)
        }
        written.push(artifact.destination)
        logger.info(`✓ ${artifact.kind}: ${artifact.destination}`)
      }
    },
    error => logger.warn("Could not release privileges after the failed install", error, { step: "installing" }),
  ).catch((error: unknown) => {
    if (error instanceof InstallError) throw error
    // acquisition or release
    throw acquired ? new InstallError("privileged session", "(release)", error) : InstallError.privilegesUnavailable(error)
  })

  return written
}
