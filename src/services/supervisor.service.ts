import { UserRecord } from '../types/user.types';
import { FolderStructure } from '../types/project.types';
import { ChatMessage, LlmClient } from './llm.service';
import { ProjectService } from './project.service';
import { logger } from '../utils/logger';

export function buildSystemPrompt(structure: FolderStructure, project?: string): string {
  const lines = [
    'You are a helpful AI assistant supervising a user\'s document projects.',
    'Each project has a "main" folder of committed files and a "temp" folder of staged uploads.',
    `Current folder structure: ${JSON.stringify(structure)}`,
  ];
  if (project) {
    lines.push(`The user is working in project "${project}".`);
  }
  return lines.join('\n');
}

/**
 * Relays a user's message to the language model together with a view of
 * the user's projects, billed to the user's own key.
 */
export class SupervisorService {
  private readonly llm: LlmClient;
  private readonly projects: ProjectService;

  constructor(llm: LlmClient, projects: ProjectService) {
    this.llm = llm;
    this.projects = projects;
  }

  async ask(user: UserRecord, message: string, project?: string): Promise<string> {
    if (project) {
      // 404 before spending a model call on a project that does not exist
      await this.projects.getProject(user.username, project);
    }

    const structure = await this.projects.getFolderStructure(user.username);
    const messages: ChatMessage[] = [
      { role: 'system', content: buildSystemPrompt(structure, project) },
      { role: 'user', content: message },
    ];

    const reply = await this.llm.chat(user.external_api_key, messages);
    logger.info(`Supervisor replied to ${user.username}`, { replyLength: reply.length });
    return reply;
  }
}
