import { ContainerLinuxConfigError, transpileContainerLinuxConfig } from "./container-linux-config.js";

export type PostprocessorName = "ct";

export type Postprocessor = {
  name: PostprocessorName;
  description: string;
  transform(userData: string): string;
};

export class PostprocessorError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PostprocessorError";
  }
}

const containerLinuxTranspiler: Postprocessor = {
  name: "ct",
  description: "Container Linux Config transpiled to Ignition JSON",
  transform: (userData) => {
    try {
      return JSON.stringify(transpileContainerLinuxConfig(userData));
    } catch (err) {
      if (err instanceof ContainerLinuxConfigError) throw new PostprocessorError(`Postprocessor error: ${err.message}`);
      throw err;
    }
  },
};

export const POSTPROCESSORS: Readonly<Record<PostprocessorName, Postprocessor>> = {
  ct: containerLinuxTranspiler,
};

function isPostprocessorName(name: string): name is PostprocessorName {
  return Object.prototype.hasOwnProperty.call(POSTPROCESSORS, name);
}

export function resolvePostprocessor(name: string): Postprocessor {
  const key = name.trim();
  if (!isPostprocessorName(key)) {
    throw new PostprocessorError(`Postprocessor error: unknown postprocessor: '${key}'`);
  }
  return POSTPROCESSORS[key];
}
