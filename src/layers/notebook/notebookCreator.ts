import { RuntimeConfig } from "../../config/runtimeConfig.js";
import { LessonContent, MediaAsset, StageArtifact } from "../../domain/models.js";
import { FallbackChain, toStageArtifact } from "../../runtime/fallbackChain.js";
import { failed, succeeded } from "../../runtime/outcome.js";

interface NotebookCell {
  id: string;
  cell_type: "markdown" | "code";
  metadata: Record<string, never>;
  source: string[];
  execution_count?: null;
  outputs?: never[];
}

const NOTEBOOK_TIMEOUT_MS = 10000;

/** Stage 5: a Jupyter notebook per coding lesson. */
export class NotebookCreator {
  private readonly chain: FallbackChain<LessonContent, MediaAsset>;

  constructor(config: RuntimeConfig) {
    this.chain = new FallbackChain<LessonContent, MediaAsset>(
      {
        stage: "notebooks",
        producers: [
          {
            name: "full-notebook",
            timeoutMs: NOTEBOOK_TIMEOUT_MS,
            retryable: false,
            external: false,
            async produce(content) {
              if (content.codeExamples.length === 0 && content.exercises.every((exercise) => !exercise.starterCode)) {
                return failed("validation", `Lesson ${content.lessonNumber} has no code to put in a notebook`);
              }
              return succeeded(serializeNotebook(buildFullNotebook(content)));
            }
          }
        ],
        terminal: {
          name: "minimal-notebook",
          produce: (content) => serializeNotebook(buildMinimalNotebook(content))
        }
      },
      { retryCount: config.retryCount, verbose: config.verboseLogs }
    );
  }

  async create(content: LessonContent, signal?: AbortSignal): Promise<StageArtifact<MediaAsset>> {
    const result = await this.chain.execute(content, signal, `lesson ${content.lessonNumber}`);
    return toStageArtifact("notebooks", content.lessonNumber, result);
  }
}

function buildFullNotebook(content: LessonContent): NotebookCell[] {
  const cells = new CellBuilder();
  cells.markdown(`# Lesson ${content.lessonNumber}: ${content.title}\n\n${content.introduction}`);
  cells.markdown("## Setup");
  cells.code("# Run this cell first\nimport sys\nprint(sys.version)");

  for (const example of content.codeExamples) {
    cells.markdown(`## ${example.title}\n\n${example.description}`);
    cells.code(example.code);
    if (example.explanation) {
      cells.markdown(example.explanation);
    }
  }

  content.exercises.forEach((exercise, index) => {
    cells.markdown(`## Exercise ${index + 1}: ${exercise.title} (${exercise.difficulty})\n\n${exercise.description}`);
    cells.code(exercise.starterCode || "# Your code here");
    if (exercise.solution) {
      cells.markdown(`<details><summary>Solution</summary>\n\n\`\`\`python\n${exercise.solution}\n\`\`\`\n\n</details>`);
    }
  });

  if (content.keyTakeaways.length > 0) {
    cells.markdown(`## Key takeaways\n\n${content.keyTakeaways.map((item) => `- ${item}`).join("\n")}`);
  }
  cells.markdown(`## Summary\n\n${content.summary}`);
  return cells.build();
}

function buildMinimalNotebook(content: LessonContent): NotebookCell[] {
  const cells = new CellBuilder();
  cells.markdown(`# Lesson ${content.lessonNumber}: ${content.title}\n\n${content.introduction}`);
  cells.code("# Try the ideas from this lesson here");
  cells.markdown(`## Summary\n\n${content.summary}`);
  return cells.build();
}

function serializeNotebook(cells: NotebookCell[]): MediaAsset {
  const notebook = {
    cells,
    metadata: {
      kernelspec: { display_name: "Python 3", language: "python", name: "python3" },
      language_info: { name: "python" }
    },
    nbformat: 4,
    nbformat_minor: 5
  };

  return {
    bytes: new TextEncoder().encode(`${JSON.stringify(notebook, null, 1)}\n`),
    mediaType: "application/x-ipynb+json",
    extension: "ipynb"
  };
}

class CellBuilder {
  private readonly cells: NotebookCell[] = [];

  markdown(text: string): void {
    this.cells.push({ id: this.nextId(), cell_type: "markdown", metadata: {}, source: toSourceLines(text) });
  }

  code(text: string): void {
    this.cells.push({
      id: this.nextId(),
      cell_type: "code",
      metadata: {},
      source: toSourceLines(text),
      execution_count: null,
      outputs: []
    });
  }

  build(): NotebookCell[] {
    return [...this.cells];
  }

  private nextId(): string {
    return `cell-${this.cells.length + 1}`;
  }
}

/** nbformat stores source as lines that keep their trailing newline, except the last. */
function toSourceLines(text: string): string[] {
  const lines = text.split("\n");
  return lines.map((line, index) => (index < lines.length - 1 ? `${line}\n` : line));
}
