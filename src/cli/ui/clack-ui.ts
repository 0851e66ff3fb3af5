import {
  intro as clackIntro,
  outro as clackOutro,
  isCancel,
  log,
  type Option,
  select,
} from "@clack/prompts";

export type SelectOption<TValue extends string> = Option<TValue> & {
  value: TValue;
};

export type OutputStream = {
  write(chunk: string): boolean;
};

export type ClackUi = {
  intro(message: string): void;
  outro(message: string): void;
  step(message: string): void;
  info(message: string): void;
  error(message: string): void;
  selectOne<TValue extends string>(
    message: string,
    options: readonly SelectOption<TValue>[]
  ): Promise<TValue | null>;
  print(text: string): void;
};

export type CreateClackUiOptions = {
  stdout?: OutputStream;
};

export function createClackUi(options: CreateClackUiOptions = {}): ClackUi {
  const stdout: OutputStream = options.stdout ?? process.stdout;

  function intro(message: string): void {
    clackIntro(message);
  }

  function outro(message: string): void {
    clackOutro(message);
  }

  function step(message: string): void {
    log.step(message);
  }

  function info(message: string): void {
    log.info(message);
  }

  function error(message: string): void {
    log.error(message);
  }

  async function selectOne<TValue extends string>(
    message: string,
    selectOptions: readonly SelectOption<TValue>[]
  ): Promise<TValue | null> {
    const value = await select({
      message,
      options: [...selectOptions],
      initialValue: selectOptions[0]?.value,
    });

    if (isCancel(value)) {
      return null;
    }

    const match = selectOptions.find((option) => option.value === value);
    if (match) {
      return match.value;
    }

    throw new Error("Unexpected selection value");
  }

  function print(text: string): void {
    stdout.write(text);
    if (!text.endsWith("\n")) {
      stdout.write("\n");
    }
  }

  return {
    intro,
    outro,
    step,
    info,
    error,
    selectOne,
    print,
  };
}
