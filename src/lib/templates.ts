import * as fs from 'node:fs';
import * as path from 'node:path';
import type { ArtifactKind, TemplateProvider } from './types.js';
import { DIRECTORY_KINDS } from './paths.js';
import { log } from './logger.js';

const TEMPLATE_NAMES: Record<ArtifactKind, string> = {
    principles: 'constitution-template.md',
    spec: 'spec-template.md',
    plan: 'plan-template.md',
    research: 'research-template.md',
    dataModel: 'data-model-template.md',
    contracts: 'contracts',
    quickstart: 'quickstart-template.md',
    tasks: 'tasks-template.md',
};

/**
 * Copies `<templatesDir>/<kind>-template.md` into place, or creates an empty
 * artifact when the project ships no template for that kind. Existing
 * artifacts are never overwritten.
 */
export class FileTemplateProvider implements TemplateProvider {
    constructor(private readonly templatesDir: string) {}

    createFromTemplate(kind: ArtifactKind, destinationPath: string): void {
        if (fs.existsSync(destinationPath)) {
            log('debug', `Artifact already present, leaving as is: ${destinationPath}`);
            return;
        }

        const templatePath = path.join(this.templatesDir, TEMPLATE_NAMES[kind]);

        if (DIRECTORY_KINDS.has(kind)) {
            if (fs.existsSync(templatePath) && fs.statSync(templatePath).isDirectory()) {
                fs.cpSync(templatePath, destinationPath, { recursive: true });
            } else {
                fs.mkdirSync(destinationPath, { recursive: true });
            }
            return;
        }

        fs.mkdirSync(path.dirname(destinationPath), { recursive: true });
        if (fs.existsSync(templatePath)) {
            fs.copyFileSync(templatePath, destinationPath);
            log('debug', `Seeded ${kind} from ${templatePath}`);
        } else {
            fs.writeFileSync(destinationPath, '', 'utf-8');
            log('debug', `No ${kind} template found, created empty ${destinationPath}`);
        }
    }
}
