import { InvalidArgumentError } from '../../retrieval/errors';
import { MetadataStore } from '../../retrieval/metadata-store';
import { intentRecord } from '../fixtures/table-embedder';

describe('MetadataStore', () => {
  it('keeps records in insertion order', () => {
    const store = new MetadataStore([intentRecord('hi', 'greeting', ['Hello!'])]);
    store.append([intentRecord('bye', 'farewell', ['Goodbye!'])]);

    expect(store.size).toBe(2);
    expect(store.toArray().map((record) => record.tag)).toEqual(['greeting', 'farewell']);
  });

  it('hands out copies that cannot alter the stored record', () => {
    const store = new MetadataStore([intentRecord('hi', 'greeting', ['Hello!'])]);

    const copy = store.get(0);
    copy.responses.push('Injected');
    copy.tag = 'changed';

    expect(store.get(0)).toEqual(intentRecord('hi', 'greeting', ['Hello!']));
  });

  it('validates the whole batch before storing anything', () => {
    const store = new MetadataStore();

    expect(() => store.append([
      intentRecord('hi', 'greeting'),
      { text: '  ', tag: 'blank', responses: [], kind: 'pattern' }
    ])).toThrow('Invalid record at position 1: text: Record text cannot be empty');
    expect(store.size).toBe(0);
  });

  it('rejects unknown record kinds and extra fields', () => {
    const store = new MetadataStore();

    expect(() => store.append([{ text: 'a', tag: 'b', responses: [], kind: 'document' }])).toThrow(InvalidArgumentError);
    expect(() => store.append([{ text: 'a', tag: 'b', responses: [], kind: 'pattern', extra: 1 }])).toThrow(InvalidArgumentError);
  });

  it('rejects positions outside the store', () => {
    expect(() => new MetadataStore().get(0)).toThrow('No record at position 0');
  });
});
