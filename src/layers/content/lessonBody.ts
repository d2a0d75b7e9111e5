import { CodeExample, ContentSection, Exercise, LessonBody } from "../../domain/models.js";
import { Outcome, failed, succeeded } from "../../runtime/outcome.js";
import { asObjectArray, asString, asStringArray, asText, isRecord } from "../../utils/json.js";

/** Keys a heuristically repaired lesson must still carry to be trusted. */
export const REQUIRED_LESSON_KEYS = ["introduction", "summary"] as const;

export function parseLessonBody(value: Record<string, unknown>, title: string): Outcome<LessonBody> {
  const introduction = asString(value.introduction);
  if (!introduction) {
    return failed("validation", `Lesson "${title}" has no introduction`);
  }

  return succeeded({
    introduction,
    sections: parseSections(value.sections ?? value.main_content ?? value.mainContent),
    codeExamples: asObjectArray(value.code_examples ?? value.codeExamples)
      .map(parseCodeExample)
      .filter((example) => example.code.length > 0),
    exercises: asObjectArray(value.exercises).map(parseExercise),
    keyTakeaways: asStringArray(value.key_takeaways ?? value.keyTakeaways),
    summary: asString(value.summary) || `This lesson covered ${title}.`
  });
}

/** Deterministic body keyed only by the lesson title. */
export function lessonTemplate(title: string): LessonBody {
  return {
    introduction: `Welcome to ${title}. This lesson introduces the core ideas behind ${title} and shows where they appear in practice.`,
    sections: [
      {
        heading: `What ${title} is`,
        body: `${title} is a building block of the course. We start with the vocabulary and the problems it addresses.`
      },
      {
        heading: `How ${title} works`,
        body: `We break ${title} into small steps and look at what each step contributes to the whole.`
      },
      {
        heading: `Where ${title} is used`,
        body: `Finally we look at common situations where ${title} is applied and the mistakes to avoid.`
      }
    ],
    codeExamples: [],
    exercises: [
      {
        title: `Explain ${title}`,
        description: `Write a short explanation of ${title} in your own words, with one example from your own work.`,
        difficulty: "Easy",
        starterCode: "",
        solution: ""
      }
    ],
    keyTakeaways: [
      `${title} has a small set of core ideas.`,
      `Each idea can be practised on its own.`,
      `Applying ${title} gets easier with deliberate practice.`
    ],
    summary: `In this lesson we covered the essentials of ${title}. Review the key takeaways before moving on.`
  };
}

function parseSections(value: unknown): ContentSection[] {
  if (!Array.isArray(value)) {
    const text = asText(value);
    return text ? [{ heading: "Overview", body: text }] : [];
  }

  return value
    .map((item, index): ContentSection => {
      if (isRecord(item)) {
        return {
          heading: asString(item.heading ?? item.title, `Part ${index + 1}`),
          body: asText(item.body ?? item.content)
        };
      }
      return { heading: `Part ${index + 1}`, body: asText(item) };
    })
    .filter((section) => section.body.length > 0);
}

function parseCodeExample(value: Record<string, unknown>, index: number): CodeExample {
  return {
    title: asString(value.title, `Example ${index + 1}`),
    description: asString(value.description),
    code: asText(value.code),
    explanation: asString(value.explanation)
  };
}

function parseExercise(value: Record<string, unknown>, index: number): Exercise {
  return {
    title: asString(value.title, `Exercise ${index + 1}`),
    description: asString(value.description),
    difficulty: asString(value.difficulty, "Medium"),
    starterCode: asText(value.starter_code ?? value.starterCode),
    solution: asText(value.solution)
  };
}
