import type { Command } from "commander";
import { logger } from "../../core/logger";
import { describeError, resolveExitCode } from "../../core/errors";
import { readPostsFile } from "../../services/output-writer";

export const commands = (program: Command) => {
  program
    .command("posts:show")
    .description("Validate a saved posts file and print a summary")
    .argument("<file>", "Path to a JSON file written by the scrape command")
    .action(async (file: string) => {
      try {
        const document = await readPostsFile(file);
        console.log(`${document.company_name} (${document.timestamp}) from ${document.source_url}`);
        console.log(`  Posts: ${document.post_count}`);
        for (const [index, post] of document.posts.entries()) {
          const preview = post.text.length > 80 ? `${post.text.slice(0, 80)}...` : post.text;
          console.log(`  #${index + 1} [${post.likes} likes, ${post.comments} comments, ${post.shares} shares] ${preview}`);
        }
      } catch (error) {
        logger.error({ error: describeError(error) }, "Could not read posts file");
        process.exit(resolveExitCode(error));
      }
    });
};
