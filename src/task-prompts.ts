/**
 * Prompt templates. The JSON shapes embedded in the feature and fix prompts
 * are the only thing steering the model towards the change-set contract;
 * change-set.ts validates whatever comes back.
 */

export const FEATURE_RESPONSE_SHAPE = `{
    "plan": "Overall implementation strategy",
    "files": [
        {
            "path": "relative/path/to/file",
            "action": "create|modify",
            "content": "complete file content",
            "description": "what this file does"
        }
    ],
    "dependencies": ["list", "of", "new", "dependencies"],
    "tests": ["list", "of", "test", "files", "to", "create"],
    "notes": "additional implementation notes"
}`;

export const FIX_RESPONSE_SHAPE = `{
    "analysis": "problem analysis and root causes",
    "fixes": [
        {
            "file": "relative/path/to/file",
            "issue": "description of issue in this file",
            "solution": "description of fix",
            "content": "complete fixed file content"
        }
    ],
    "tests": ["suggested test changes"],
    "notes": "additional notes about the fixes"
}`;

const JSON_ONLY =
  'Respond with a single JSON object and nothing else: no markdown, no commentary. ' +
  'Every "content" value must be the COMPLETE file content, never a diff or an excerpt. ' +
  'Every path must be relative to the repository root.';

export function codeGenerationPrompt(problem: string, language: string): string {
  return `
You are a ${language} code generator. Given a problem statement, generate clean, executable ${language} code.

Problem: ${problem}

Requirements:
1. Generate only ${language} code that solves the problem
2. Include necessary imports
3. Add a main function or execution block
4. Make the code self-contained and executable
5. Do not include explanations or markdown formatting
6. Ensure the code is safe and doesn't perform harmful operations

Generate the ${language} code:
`.trim();
}

export function featurePrompt(description: string, context: string): string {
  return `
Based on this repository structure, implement the following feature:

FEATURE: ${description}

REPOSITORY CONTEXT:
${context}

Please provide a detailed implementation plan with:
1. List of files to modify/create
2. Specific code changes for each file
3. Any new dependencies or configurations needed
4. Testing considerations

Format your response as JSON with this structure:
${FEATURE_RESPONSE_SHAPE}

${JSON_ONLY}
`.trim();
}

export function fixPrompt(description: string, context: string): string {
  return `
Analyze this repository and fix the following issues:

ISSUES: ${description}

REPOSITORY CONTEXT:
${context}

Please provide specific fixes with:
1. Identification of the problems
2. Root cause analysis
3. Specific code changes needed
4. Files to modify

Format your response as JSON with this structure:
${FIX_RESPONSE_SHAPE}

${JSON_ONLY}
`.trim();
}

export function summaryPrompt(context: string): string {
  return `
Analyze this repository and provide a comprehensive summary:

${context}

Please provide:
1. Project overview and purpose
2. Main technologies and frameworks used
3. Architecture and structure analysis
4. Key components and their relationships
5. Potential improvements or issues
6. Development recommendations

Make your analysis detailed but concise.
`.trim();
}

export function improvementPrompt(context: string, focus?: string): string {
  const focusText = focus?.trim() ? `Focus specifically on: ${focus.trim()}` : 'Consider all aspects';
  return `
Analyze this repository and suggest specific improvements:

${context}

${focusText}

Please provide:
1. Code quality improvements
2. Architecture enhancements
3. Performance optimizations
4. Security considerations
5. Testing improvements
6. Documentation suggestions
7. Specific code changes with examples

Provide actionable recommendations with code examples where applicable.
`.trim();
}
