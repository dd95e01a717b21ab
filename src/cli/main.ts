// src/cli/main.ts

import figlet from 'figlet';
import gradient from 'gradient-string';
import { program } from './index.ts';

console.log(
    gradient.rainbow.multiline(
        figlet.textSync('GWD Tools', {
            font: 'Standard',
            horizontalLayout: 'default',
            verticalLayout: 'default',
            width: 80,
            whitespaceBreak: true,
        }),
    ),
);
console.log(gradient.rainbow('Convert GWD images to PNG and back.\n'));

await program.parseAsync(process.argv);
