import type { Tool } from "@modelcontextprotocol/sdk/types.js";

const pathProperty = {
  type: "string",
  description: "Notebook path (e.g., 'analysis.ipynb' or 'course/01-intro.ipynb'), relative to the server's working directory",
};

const startAtProperty = {
  type: "integer",
  minimum: 0,
  description: "Number given to the first level-1 heading. Default: 1",
};

const dryRunProperty = {
  type: "boolean",
  description: "Report what would change without writing the file. Default: false",
};

const contentsProperties = {
  numbered_labels: {
    type: "boolean",
    description: "Show section numbers in the contents links. Default: false",
  },
  include_title: {
    type: "boolean",
    description: "List a title heading that is the notebook's only level-1 heading. Default: false",
  },
};

const outlineProperties = {
  start_at: startAtProperty,
  ...contentsProperties,
  tasks: {
    type: "boolean",
    description: "Also number exercise markers (#Code task<n>#, #Code answer<n>#, **Q<n>:**, **A<n>:**). Default: false",
  },
  backup: {
    type: "boolean",
    description: "Keep the previous file as <path>.bak. Default: false",
  },
  dry_run: dryRunProperty,
};

export const toolSchemas: Tool[] = [
  {
    name: "number_headings",
    description:
      "Number the Markdown headings of a notebook hierarchically (1, 1.1, 1.2, 2, ...). Existing numbers are replaced, so running it again gives the same result. Writes the notebook in place.",
    inputSchema: {
      type: "object",
      properties: {
        path: pathProperty,
        start_at: startAtProperty,
        dry_run: dryRunProperty,
      },
      required: ["path"],
    },
  },
  {
    name: "insert_contents",
    description:
      "Insert or refresh the generated table-of-contents cell. The cell goes at the top of the notebook (after a leading title cell) and is replaced in place on later runs. Extra contents cells are removed.",
    inputSchema: {
      type: "object",
      properties: {
        path: pathProperty,
        ...contentsProperties,
        dry_run: dryRunProperty,
      },
      required: ["path"],
    },
  },
  {
    name: "outline_notebook",
    description:
      "Number headings and refresh the table of contents in one step. Returns a summary and the next chapter number (to continue numbering in the next notebook of a series).",
    inputSchema: {
      type: "object",
      properties: {
        path: pathProperty,
        ...outlineProperties,
      },
      required: ["path"],
    },
  },
  {
    name: "outline_series",
    description:
      "Outline several notebooks in order. With continue_numbering (default true) each notebook's chapters continue from where the previous one stopped. A failing notebook does not stop the others.",
    inputSchema: {
      type: "object",
      properties: {
        paths: {
          type: "array",
          items: { type: "string" },
          minItems: 1,
          description: "Notebook paths, in series order",
        },
        continue_numbering: {
          type: "boolean",
          description: "Continue chapter numbers across notebooks. Default: true",
        },
        ...outlineProperties,
      },
      required: ["paths"],
    },
  },
  {
    name: "number_tasks",
    description:
      "Number exercise markers: code task/answer markers in code and raw cells, question/answer markers in Markdown cells. Each answer takes the number of the task before it.",
    inputSchema: {
      type: "object",
      properties: {
        path: pathProperty,
        dry_run: dryRunProperty,
      },
      required: ["path"],
    },
  },
  {
    name: "export_variant",
    description:
      "Write an exercise copy (answers blanked, code answers removed) or a solution copy (code task stubs removed) of a notebook to a new file. Raw cells become code cells in both.",
    inputSchema: {
      type: "object",
      properties: {
        path: pathProperty,
        variant: {
          type: "string",
          enum: ["exercise", "solution"],
          description: "Which copy to write",
        },
        output_path: {
          type: "string",
          description: "Destination path; must differ from path",
        },
      },
      required: ["path", "variant", "output_path"],
    },
  },
  {
    name: "get_outline",
    description:
      "Read-only: list the notebook's headings (level, number, text, anchor) and show where and what the contents cell would be.",
    inputSchema: {
      type: "object",
      properties: {
        path: pathProperty,
        ...contentsProperties,
      },
      required: ["path"],
    },
  },
];
