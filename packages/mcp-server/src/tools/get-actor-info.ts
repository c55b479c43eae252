import type { ActorDetails, TmdbClient } from '@tmdb-mcp/tmdb-client'
import { imageContent, textContent, toolError, toolSuccess, type ToolOutcome } from '../result.js'

export interface GetActorInfoArgs {
  actor_name: string
}

export function formatActorDetails(actor: ActorDetails): string {
  return [
    `ID: ${actor.id}`,
    `Name: ${actor.name}`,
    `Date of Birth: ${actor.birthday ?? ''}`,
    `Place of Birth: ${actor.place_of_birth ?? ''}`,
    `Biography: ${actor.biography}`,
  ].join('\n')
}

export async function getActorInfoTool(
  args: GetActorInfoArgs,
  client: TmdbClient,
): Promise<ToolOutcome> {
  const actor = await client.fetchActorDetails(args.actor_name)
  if (!actor) {
    return toolError(`No actors matching the name "${args.actor_name}" were found`)
  }

  const text = textContent(formatActorDetails(actor))
  if (!actor.profile_path) {
    return toolSuccess(text)
  }

  const image = await client.fetchImageAsBase64(actor.profile_path)
  return toolSuccess(text, imageContent(image, 'image/jpeg'))
}
