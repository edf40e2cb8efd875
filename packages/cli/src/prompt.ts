/**
 * The instruction prompt that accompanies the packed artifact. The user pastes it
 * into the chat after attaching the artifact.
 */
export function buildInstructionPrompt(artifactName: string): string {
  return `I have attached a file \`${artifactName}\` which contains the full source code and directory structure of my project.

**Instruction:**
1.  **Analyze** the provided codebase to understand its architecture, tech stack, and key components.
2.  **Act** as a Senior Software Architect and Coding Assistant for this specific project.
3.  **Wait** for my next command. I will ask you to implement features, fix bugs, or explain code. When I do, provide concrete code examples and file modifications that fit the existing style and structure.

Please confirm you have ingested the context and are ready.`;
}
