import * as readline from 'readline';
import { createSessionManager } from './src/bootstrap.js';
import { runWithTrace } from './src/platform/tracing.js';

const STUDENT_ID = 'cli_student_001';
const SUBJECT = process.argv[2] || 'mathematics';
const SYSTEM_PROMPT = `You are a patient ${SUBJECT} tutor. Explain step by step and check the student's understanding.`;

const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
});

function ask(prompt: string): Promise<string> {
    return new Promise((resolve) => rl.question(prompt, resolve));
}

async function main(): Promise<void> {
    console.log('=============================================');
    console.log('        Study Session Engine - CLI Demo      ');
    console.log('=============================================');

    const { manager, backend, completionClient, shutdown } = await createSessionManager();
    const session = await manager.createSession(STUDENT_ID, SUBJECT);

    console.log(`Backend: ${backend.kind}, session: ${session.sessionId}, subject: ${SUBJECT}`);
    console.log('Type your question and press Enter. (Type "exit" to quit)');

    while (true) {
        const userInput = (await ask('\n> You: ')).trim();
        if (userInput.toLowerCase() === 'exit') break;
        if (!userInput) continue;

        try {
            await runWithTrace(async () => {
                const withQuestion = await manager.addMessage(session.sessionId, 'user', userInput);
                const context = manager.getContextForApi(withQuestion, SYSTEM_PROMPT);
                const reply = await completionClient.complete(context);
                await manager.addMessage(session.sessionId, 'assistant', reply);

                const info = await manager.getSessionInfo(session.sessionId);
                console.log(`\n> Tutor: ${reply}`);
                console.log(
                    `\n[session] messages=${info.messageCount} tokens=${info.totalTokens} compressed=${info.compressed}`
                );
            }, { studentId: STUDENT_ID, sessionId: session.sessionId });
        } catch (error) {
            console.error('\n[Error]', error);
        }
    }

    await manager.deleteSession(session.sessionId);
    shutdown();
    rl.close();
    console.log('Goodbye!');
}

main().catch((error) => {
    console.error(error);
    process.exit(1);
});
