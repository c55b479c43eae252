import { expect } from 'chai'
import { Client } from '@modelcontextprotocol/sdk/client/index.js'
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js'
import type { Server } from '@modelcontextprotocol/sdk/server/index.js'
import {
  CallToolResultSchema,
  ErrorCode,
  McpError,
  type CallToolResult,
} from '@modelcontextprotocol/sdk/types.js'
import { TmdbClient } from '@tmdb-mcp/tmdb-client'
import { StubTransport, bytesResponse, jsonResponse } from '@tmdb-mcp/tmdb-client/testing'
import { pino } from 'pino'
import { createMcpServer } from '../src/server.js'

describe('MCP server', function () {
  let transport: StubTransport
  let server: Server
  let client: Client

  async function call(name: string, args: Record<string, unknown>): Promise<CallToolResult> {
    return CallToolResultSchema.parse(await client.callTool({ name, arguments: args }))
  }

  async function callError(name: string, args: Record<string, unknown>): Promise<McpError> {
    try {
      await client.callTool({ name, arguments: args })
    } catch (error) {
      if (error instanceof McpError) return error
      throw error
    }
    throw new Error('expected the call to be rejected')
  }

  beforeEach(async function () {
    transport = new StubTransport()
    server = createMcpServer({
      client: new TmdbClient({ token: 'test-token', transport }),
      logger: pino({ level: 'silent' }),
    })
    client = new Client({ name: 'test-client', version: '0.0.0' })

    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair()
    await Promise.all([client.connect(clientTransport), server.connect(serverTransport)])
  })

  afterEach(async function () {
    await client.close()
    await server.close()
  })

  it('Should list the tool catalog', async function () {
    const { tools } = await client.listTools()

    expect(tools.map((t) => [t.name, t.title])).to.deep.equal([
      ['get_actor_info', 'Get Actor Information'],
      ['get_movies_by_actor', 'Get Movies by Actor ID'],
    ])
  })

  it('Should return actor details and a jpeg profile image', async function () {
    transport
      .on('/search/person', jsonResponse({ results: [{ id: 16483 }] }))
      .on(
        '/person/16483',
        jsonResponse({
          id: 16483,
          name: 'Sylvester Stallone',
          also_known_as: ['Sly Stallone'],
          biography: 'American actor and filmmaker.',
          birthday: '1946-07-06',
          deathday: null,
          gender: 2,
          homepage: null,
          imdb_id: 'nm0000230',
          known_for_department: 'Acting',
          place_of_birth: 'New York City, New York, USA',
          popularity: 31.5,
          profile_path: '/stallone.jpg',
        }),
      )
      .on('/stallone.jpg', bytesResponse([0xff, 0xd8, 0xff]))

    const result = await call('get_actor_info', { actor_name: 'Sylvester Stallone' })

    expect(result.isError ?? false).to.equal(false)
    expect(result.content).to.deep.equal([
      {
        type: 'text',
        text:
          'ID: 16483\n' +
          'Name: Sylvester Stallone\n' +
          'Date of Birth: 1946-07-06\n' +
          'Place of Birth: New York City, New York, USA\n' +
          'Biography: American actor and filmmaker.',
      },
      { type: 'image', data: '/9j/', mimeType: 'image/jpeg' },
    ])
  })

  it('Should list movies for an actor id', async function () {
    transport.on(
      '/discover/movie',
      jsonResponse({
        results: [
          { id: 1366, title: 'Rocky', release_date: '1976-11-21' },
          { id: 9350, title: 'Cliffhanger', release_date: '1993-05-28' },
        ],
      }),
    )

    const result = await call('get_movies_by_actor', { actor_id: 1234 })

    expect(result.content).to.deep.equal([
      { type: 'text', text: '0. Rocky (1976)\n1. Cliffhanger (1993)' },
    ])
    expect(transport.requests[0].url.searchParams.get('with_cast')).to.equal('1234')
  })

  it('Should report an unknown actor as a domain error', async function () {
    transport.on('/search/person', jsonResponse({ results: [] }))

    const result = await call('get_actor_info', { actor_name: 'Nobody Atall' })

    expect(result.isError).to.equal(true)
    expect(result.content).to.deep.equal([
      { type: 'text', text: 'No actors matching the name "Nobody Atall" were found' },
    ])
  })

  it('Should report an empty filmography as a domain error', async function () {
    transport.on('/discover/movie', jsonResponse({ results: [] }))

    const result = await call('get_movies_by_actor', { actor_id: 42 })

    expect(result.isError).to.equal(true)
    expect(result.content).to.deep.equal([{ type: 'text', text: 'No movies were found!' }])
  })

  it('Should turn an upstream failure into a domain error', async function () {
    transport.on('/discover/movie', jsonResponse({ status_message: 'unavailable' }, 503))

    const result = await call('get_movies_by_actor', { actor_id: 42 })

    expect(result.isError).to.equal(true)
    expect(result.content).to.deep.equal([{ type: 'text', text: 'TMDB API error: HTTP 503' }])
  })

  it('Should turn a failed image download into a domain error', async function () {
    transport
      .on('/search/person', jsonResponse({ results: [{ id: 5 }] }))
      .on('/person/5', jsonResponse({ id: 5, name: 'Jane Doe', profile_path: '/gone.jpg' }))

    const result = await call('get_actor_info', { actor_name: 'Jane Doe' })

    expect(result.isError).to.equal(true)
    expect(result.content).to.deep.equal([{ type: 'text', text: 'TMDB API error: HTTP 404' }])
  })

  it('Should reject a malformed call before reaching TMDB', async function () {
    const missing = await callError('get_movies_by_actor', {})
    const fractional = await callError('get_movies_by_actor', { actor_id: 1.5 })
    const unknown = await callError('get_box_office', { title: 'Rocky' })

    expect([missing.code, fractional.code, unknown.code]).to.deep.equal([
      ErrorCode.InvalidParams,
      ErrorCode.InvalidParams,
      ErrorCode.InvalidParams,
    ])
    expect(unknown.message).to.include('Unknown tool: get_box_office')
    expect(transport.requests).to.have.length(0)
  })
})
