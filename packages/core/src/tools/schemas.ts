import { z } from "zod";

export const readFileToolSchema = z.object({
  file_path: z.string().min(1).describe("Path of the file to read, relative to the working directory")
});

export const writeFileToolSchema = z.object({
  file_path: z.string().min(1).describe("Path of the file to write, relative to the working directory"),
  content: z.string().describe("Complete, literal file content")
});

export const createDirectoryToolSchema = z.object({
  dir_path: z.string().min(1).describe("Directory to create, relative to the working directory")
});

export const listDirectoryToolSchema = z.object({
  dir_path: z
    .string()
    .min(1)
    .optional()
    .default(".")
    .describe("Directory to list, relative to the working directory")
});

export const checkFileExistsToolSchema = z.object({
  path: z.string().min(1).describe("File or directory to check, relative to the working directory")
});

export const executeShellToolSchema = z.object({
  command: z.string().min(1).describe("Shell command to run"),
  cwd: z
    .string()
    .min(1)
    .optional()
    .describe("Sub-directory of the working directory to run in")
});
