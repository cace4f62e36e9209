import React from 'react';
import { fireEvent, render, screen, within } from '@testing-library/react';
import { describe, expect, it } from 'vitest';
import App from './App';
import ErrorApp from './ErrorApp';
import { createAppTheme } from './theme';

const theme = createAppTheme(() => 'light');

const fillForm = (title: string, description: string, priority?: string) => {
  fireEvent.change(screen.getByLabelText('Title'), { target: { value: title } });
  fireEvent.change(screen.getByLabelText('Description'), { target: { value: description } });
  if (priority) {
    fireEvent.change(screen.getByLabelText('Priority'), { target: { value: priority } });
  }
};

const fieldValue = (label: string) => {
  const field = screen.getByLabelText(label);
  if (field instanceof HTMLInputElement || field instanceof HTMLTextAreaElement || field instanceof HTMLSelectElement) {
    return field.value;
  }
  throw new Error(`${label} is not a form field`);
};

const listedTitles = () =>
  within(screen.getByRole('list', { name: 'Todos' }))
    .getAllByRole('listitem')
    .map((item) => item.querySelector('[role="button"] > div:nth-child(2) > div')?.textContent);

describe('App', () => {
  it('starts with an empty list when seeding is off', () => {
    render(<App theme={theme} config={{ seedTodos: false }} />);
    expect(screen.getByText('No todos yet. Add one above.')).toBeTruthy();
    expect(screen.queryByRole('list', { name: 'Todos' })).toBeNull();
  });

  it('adds a todo and resets the form', () => {
    render(<App theme={theme} config={{ seedTodos: false }} />);

    fillForm('Buy groceries', 'Milk and eggs', 'Medium');
    fireEvent.click(screen.getByRole('button', { name: 'Add Todo' }));

    expect(listedTitles()).toEqual(['Buy groceries']);
    const item = screen.getByRole('button', { name: /Buy groceries/ });
    expect(within(item).getByText('Milk and eggs')).toBeTruthy();
    expect(within(item).getByText('Medium')).toBeTruthy();

    expect(fieldValue('Title')).toBe('');
    expect(fieldValue('Description')).toBe('');
    expect(fieldValue('Priority')).toBe('Low');
  });

  it('keeps insertion order', () => {
    render(<App theme={theme} config={{ seedTodos: false }} />);

    for (const title of ['First', 'Second', 'Third']) {
      fillForm(title, 'Some details');
      fireEvent.click(screen.getByRole('button', { name: 'Add Todo' }));
    }

    expect(listedTitles()).toEqual(['First', 'Second', 'Third']);
  });

  it('shows field errors and adds nothing when the input is invalid', () => {
    render(<App theme={theme} config={{ seedTodos: false }} />);

    fireEvent.click(screen.getByRole('button', { name: 'Add Todo' }));

    expect(screen.getAllByRole('alert').map((alert) => alert.textContent)).toEqual([
      'Please enter a title',
      'Please enter a description of at least 5 characters'
    ]);
    expect(screen.getByLabelText('Title').getAttribute('aria-invalid')).toBe('true');
    expect(screen.queryByRole('list', { name: 'Todos' })).toBeNull();
  });

  it('clamps the title and description fields to their maximum length', () => {
    render(<App theme={theme} config={{ seedTodos: false }} />);
    expect(screen.getByLabelText('Title').getAttribute('maxlength')).toBe('20');
    expect(screen.getByLabelText('Description').getAttribute('maxlength')).toBe('40');
  });

  it('lists the sample todos when seeding is on', () => {
    render(<App theme={theme} config={{ seedTodos: true }} />);
    expect(listedTitles()).toEqual(['Buy groceries', 'Finish homework', 'Go for a run', 'Call mom']);
  });

  it('edits a todo by replacing it in place', () => {
    render(<App theme={theme} config={{ seedTodos: true }} />);

    fireEvent.click(screen.getByRole('button', { name: /Go for a run/ }));
    expect(screen.getByRole('heading', { name: 'Edit Todo' })).toBeTruthy();
    expect(fieldValue('Title')).toBe('Go for a run');

    fillForm('Go for a run', 'Ran 10 km instead', 'High');
    fireEvent.click(screen.getByRole('button', { name: 'Save' }));

    expect(listedTitles()).toEqual(['Buy groceries', 'Finish homework', 'Go for a run', 'Call mom']);
    const item = screen.getByRole('button', { name: /Go for a run/ });
    expect(within(item).getByText('Ran 10 km instead')).toBeTruthy();
    expect(within(item).getByText('High')).toBeTruthy();
    expect(screen.getByRole('heading', { name: 'New Todo' })).toBeTruthy();
  });

  it('cancels an edit without changing the list', () => {
    render(<App theme={theme} config={{ seedTodos: true }} />);

    fireEvent.click(screen.getByRole('button', { name: /Call mom/ }));
    fillForm('Call dad', 'Wish him luck');
    fireEvent.click(screen.getByRole('button', { name: 'Cancel' }));

    expect(listedTitles()).toEqual(['Buy groceries', 'Finish homework', 'Go for a run', 'Call mom']);
    expect(fieldValue('Title')).toBe('');
  });
});

describe('ErrorApp', () => {
  it('shows the startup failure message', () => {
    render(<ErrorApp message="Remote backend initialization failed: network down" />);
    const alert = screen.getByRole('alert');
    expect(within(alert).getByText(
      'An error occurred during initialization. Please check the logs and restart the app.'
    )).toBeTruthy();
    expect(within(alert).getByText('Remote backend initialization failed: network down')).toBeTruthy();
  });
});
