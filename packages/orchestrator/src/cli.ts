import { loadConfig, createLogger, isVidfarmError, errorMessage } from '@vidfarm/shared';
import { formatSlot } from '@vidfarm/publisher';
import { createServices, type Services } from './services.js';
import { createDashboard } from './dashboard.js';

async function main() {
  const args = process.argv.slice(2);
  const command = args[0];

  if (!command || command === '--help' || command === '-h') {
    printHelp();
    process.exit(0);
  }

  const chalk = (await import('chalk')).default;
  const Table = (await import('cli-table3')).default;

  const print = {
    header: (text: string) => console.log('\n' + chalk.bold.cyan(`  ${text}`)),
    success: (text: string) => console.log(chalk.green(`  ✓ ${text}`)),
    info: (text: string) => console.log(chalk.blue(`  ℹ ${text}`)),
    error: (text: string) => console.log(chalk.red(`  ✗ ${text}`)),
    dim: (text: string) => console.log(chalk.dim(`    ${text}`)),
  };

  let services: Services | undefined;

  try {
    const config = loadConfig();
    const logger = createLogger('vidfarm', config.logLevel);
    services = await createServices(config, logger);

    switch (command) {
      case 'schedule': {
        print.header('Schedule Video Publish');
        const account = getFlag(args, '--account');
        const result = await services.scheduler.schedule({
          videoPath: getFlag(args, '--video') ?? '',
          title: getFlag(args, '--title') ?? '',
          description: getFlag(args, '--description') ?? '',
          tags: getFlag(args, '--tags')?.split(',').map((t) => t.trim()).filter(Boolean) ?? [],
          platform: getFlag(args, '--platform') ?? '',
          accountId: account !== undefined ? parseInt(account, 10) : undefined,
        });

        print.success(`Task ${chalk.bold(String(result.taskId))} scheduled on ${result.platform}`);
        print.dim(`Publish at ${result.scheduledTime.toLocaleString()} (${result.policy} policy)`);
        break;
      }

      case 'pending': {
        const platform = getFlag(args, '--platform');
        print.header(platform ? `Pending Tasks — ${platform}` : 'Pending Tasks');
        const tasks = await services.scheduler.getPendingTasks(platform);

        if (tasks.length === 0) {
          print.info('Queue is empty');
          break;
        }

        const table = new Table({
          head: [
            chalk.cyan('ID'),
            chalk.cyan('Platform'),
            chalk.cyan('Account'),
            chalk.cyan('Scheduled'),
            chalk.cyan('Title'),
          ],
          colWidths: [6, 12, 9, 24, 40],
        });

        for (const task of tasks) {
          table.push([
            task.id.toString(),
            task.platform,
            task.accountId?.toString() ?? '-',
            task.scheduledTime.toLocaleString(),
            task.title.slice(0, 38),
          ]);
        }
        console.log(table.toString());
        print.dim(`${tasks.length} pending`);
        break;
      }

      case 'platforms': {
        print.header('Platform Policies');
        const table = new Table({
          head: [
            chalk.cyan('Platform'),
            chalk.cyan('Weekday slots'),
            chalk.cyan('Weekend slots'),
            chalk.cyan('Min gap'),
            chalk.cyan('Max/day'),
          ],
        });

        for (const [name, policy] of services.policies) {
          table.push([
            name,
            policy.weekdaySlots.map(formatSlot).join(' '),
            policy.weekendSlots.map(formatSlot).join(' '),
            `${Math.round(policy.minIntervalSeconds / 60)}m`,
            policy.maxDaily.toString(),
          ]);
        }
        console.log(table.toString());
        print.dim('Unknown platforms publish one hour after scheduling');
        break;
      }

      case 'worker': {
        const worker = services.createWorker({ platform: getFlag(args, '--platform') });

        if (args.includes('--once')) {
          const summary = await worker.runOnce();
          print.success(`Picked ${summary.picked}, completed ${summary.completed}, failed ${summary.failed}`);
          break;
        }

        print.header('Publish Worker');
        worker.start();
        await waitForSignal();
        await worker.stop();
        await services.close();
        return;
      }

      case 'dashboard': {
        const port = getFlag(args, '--port');
        const server = createDashboard(services, logger, port ? parseInt(port, 10) : config.dashboardPort);
        await waitForSignal();
        server.close();
        await services.close();
        return;
      }

      default:
        print.error(`Unknown command: ${command}`);
        printHelp();
        await services.close();
        process.exit(1);
    }

    await services.close();
  } catch (err) {
    const code = isVidfarmError(err) ? ` [${err.code}]` : '';
    console.error(chalk.red(`\n  ✗ Error${code}: ${errorMessage(err)}`));
    await services?.close();
    process.exit(1);
  }
}

function waitForSignal(): Promise<void> {
  return new Promise((resolve) => {
    process.once('SIGINT', () => resolve());
    process.once('SIGTERM', () => resolve());
  });
}

function printHelp() {
  console.log(`
  vidfarm — publish scheduling for the video pipeline

  Usage:
    npm run vidfarm <command> [options]

  Commands:
    schedule                   Queue a finished video at its next optimal slot
      --video <path>           Rendered video file
      --title "<title>"        Video title
      --platform <name>        douyin, bilibili, ... (unknown names publish in 1h)
      --description "<text>"   Optional description
      --tags <a,b,c>           Optional comma-separated tags
      --account <id>           Optional platform account id

    pending                    List pending publish tasks in queue order
      --platform <name>        Only one platform

    platforms                  Show the platform cadence policies

    worker                     Drain due tasks (dry run unless DRY_RUN=false)
      --platform <name>        Only one platform
      --once                   Run a single pass and exit

    dashboard                  Start the HTTP API
      --port <n>               Port (default: DASHBOARD_PORT or 3000)
  `);
}

function getFlag(args: string[], flag: string): string | undefined {
  const idx = args.indexOf(flag);
  return idx >= 0 ? args[idx + 1] : undefined;
}

void main();
