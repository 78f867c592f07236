#!/usr/bin/env node
import { createInterface } from 'node:readline/promises';
import { fileURLToPath } from 'node:url';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { StdioClientTransport } from '@modelcontextprotocol/sdk/client/stdio.js';
import { CallToolResultSchema, Tool } from '@modelcontextprotocol/sdk/types.js';
import { parseCliArguments } from './cli-arguments.js';
import { SERVER_VERSION } from './server.js';

// Interactive menu over the stdio server, for poking at a board by hand

function inheritedEnv(): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(process.env)) {
    if (value !== undefined) env[key] = value;
  }
  return env;
}

function describeArguments(tool: Tool): string {
  const properties = tool.inputSchema.properties ?? {};
  const required = new Set(tool.inputSchema.required ?? []);
  const names = Object.keys(properties).map((name) => (required.has(name) ? `${name}*` : name));
  return names.length > 0 ? names.join(' ') : '(none)';
}

function printMenu(tools: Tool[]): void {
  console.log('\nTools:');
  tools.forEach((tool, index) => {
    console.log(`  ${String(index + 1).padStart(2)}. ${tool.name}`);
  });
  console.log('   r. read a resource (monday://board/...)');
  console.log('   q. quit');
}

async function callTool(client: Client, tool: Tool, line: string): Promise<void> {
  const args = parseCliArguments(tool, line);
  const raw = await client.callTool({ name: tool.name, arguments: args });
  const result = CallToolResultSchema.parse(raw);

  if (result.isError) console.log('Tool reported an error:');
  for (const block of result.content) {
    console.log(block.type === 'text' ? block.text : `[${block.type} content]`);
  }
}

async function readResource(client: Client, uri: string): Promise<void> {
  const result = await client.readResource({ uri });
  for (const entry of result.contents) {
    console.log('text' in entry ? entry.text : `[binary ${entry.mimeType ?? 'content'}]`);
  }
}

async function main() {
  const serverPath = fileURLToPath(new URL('./index.js', import.meta.url));
  const transport = new StdioClientTransport({
    command: process.execPath,
    args: [serverPath],
    env: inheritedEnv(),
    stderr: 'inherit',
  });
  const client = new Client({ name: 'monday-board-cli', version: SERVER_VERSION });
  await client.connect(transport);

  const { tools } = await client.listTools();
  const rl = createInterface({ input: process.stdin, output: process.stdout });

  try {
    for (;;) {
      printMenu(tools);
      const choice = (await rl.question('\nChoose: ')).trim();
      if (choice === 'q' || choice === 'quit') break;

      try {
        if (choice === 'r') {
          const uri = (await rl.question('URI: ')).trim();
          await readResource(client, uri);
          continue;
        }

        const tool = tools[Number(choice) - 1];
        if (!tool) {
          console.log(`No such option: ${choice}`);
          continue;
        }

        console.log(tool.description?.split('\n')[0] ?? '');
        console.log(`Arguments (key=value or JSON; * = required): ${describeArguments(tool)}`);
        await callTool(client, tool, await rl.question('> '));
      } catch (error) {
        console.log(`Error: ${error instanceof Error ? error.message : String(error)}`);
      }
    }
  } finally {
    rl.close();
    await client.close();
  }
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
