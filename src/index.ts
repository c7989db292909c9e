import PrettyError from 'pretty-error';
import * as core from '@actions/core';
import * as os from 'os';
import { resolveOptions } from './options';
import { runOrganizer } from './organizer';

const main = async () => {
  const options = resolveOptions();

  core.info(
    `Organizing '*${options.extension}' files from '${options.artifactsDir}' into '${options.outputRoot}', size limit: ${options.sizeLimit} bytes`
  );

  await runOrganizer(options);
};

main()
  .then(() => core.info(`Wheel organization completed successfully`))
  .catch((err) => {
    const pe = new PrettyError();
    const rendered = pe.render(err);

    process.stderr.write(`${rendered}${os.EOL}`);
    core.setFailed(rendered);
  });
